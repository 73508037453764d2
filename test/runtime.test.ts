import {EventEmitter} from 'events';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {
    ChannelStore,
    createDefaultDescriptor,
    createDefaultSplash,
    defaultConfig,
    formatStats,
    HotReloadController,
    LoadAverageSource,
    OverlayError,
    OverlayRuntime,
    PushScheduler,
    ReconciliationEngine,
    RecordingRenderer,
    SignalFlags,
    silentLogger,
    SplashController,
    StatsTracker,
    TelemetryPoller,
    type Logger,
    type ObservableDatagramSource,
    type OverlayConfig,
    type SplashDescriptor,
    type TelemetrySource,
} from '../src';

const createLogger = () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
}) satisfies Logger;

/** In-process datagram source fed by the test. */
class FakeSource extends EventEmitter implements ObservableDatagramSource {
    public readonly waits: number[] = [];
    public bindError: Error | undefined;
    public listened = false;
    public closed = false;
    public onWait: (() => void) | undefined;
    private queue: Buffer[] = [];

    public push(text: string): void {
        this.queue.push(Buffer.from(text, 'utf8'));
    }

    public async listen(): Promise<void> {
        if (this.bindError) throw this.bindError;
        this.listened = true;
    }

    public async waitForDatagram(timeoutMs: number): Promise<boolean> {
        this.waits.push(timeoutMs);
        this.onWait?.();
        return this.queue.length > 0;
    }

    public takeLatest(): Buffer | undefined {
        const latest = this.queue[this.queue.length - 1];
        this.queue = [];
        return latest;
    }

    public async close(): Promise<void> {
        this.closed = true;
    }
}

const enabledSplash = (durationMs: number): SplashDescriptor => {
    const splash = createDefaultSplash();
    return {enabled: true, durationMs, asset: {...splash.asset, imagePath: '/tmp/splash.png'}};
};

describe('PushScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(1000);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('waits the idle cap while nothing is pending', () => {
        const scheduler = new PushScheduler();

        expect(scheduler.shouldPush()).toBe(false);
        expect(scheduler.nextWait()).toBe(100);
    });

    it('pushes right away before the first push', () => {
        const scheduler = new PushScheduler();
        scheduler.markDirty();

        expect(scheduler.shouldPush()).toBe(true);
        expect(scheduler.nextWait()).toBe(0);
    });

    it('holds changes until the coalescing window has elapsed', () => {
        const scheduler = new PushScheduler();
        scheduler.recordPush();

        vi.advanceTimersByTime(10);
        scheduler.markDirty();
        expect(scheduler.shouldPush()).toBe(false);
        expect(scheduler.nextWait()).toBe(22);

        vi.advanceTimersByTime(22);
        expect(scheduler.shouldPush()).toBe(true);
        expect(scheduler.nextWait()).toBe(0);

        scheduler.recordPush();
        expect(scheduler.isDirty()).toBe(false);
        expect(scheduler.snapshot()).toEqual({hasPending: false, lastPushTime: 1032, coalescingWindow: 32});
    });

    it('never waits longer than the idle cap', () => {
        const scheduler = new PushScheduler();
        scheduler.recordPush();
        scheduler.markDirty();
        scheduler.setIdleCap(10);

        expect(scheduler.nextWait()).toBe(10);
    });

    it('validates its settings', () => {
        expect(() => new PushScheduler({coalescingWindowMs: -1})).toThrow(RangeError);
        expect(() => new PushScheduler({idleCapMs: 0})).toThrow(RangeError);
        expect(() => new PushScheduler().setIdleCap(-5)).toThrow(RangeError);
    });
});

describe('SplashController', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('shows the splash for its duration', () => {
        const renderer = new RecordingRenderer();
        const splash = new SplashController(renderer, silentLogger);

        expect(splash.show(enabledSplash(500))).toBe(true);
        expect(renderer.calls.map((call) => call.method)).toEqual(['create', 'restyle']);
        expect(renderer.calls[0]).toEqual({method: 'create', handle: 1, id: -1, kind: 'image'});

        vi.advanceTimersByTime(499);
        expect(splash.isVisible()).toBe(true);

        vi.advanceTimersByTime(1);
        expect(splash.isVisible()).toBe(false);
        expect(renderer.calls[2]).toEqual({method: 'destroy', handle: 1});
    });

    it('does nothing when disabled or without a duration', () => {
        const renderer = new RecordingRenderer();
        const splash = new SplashController(renderer, silentLogger);

        expect(splash.show(createDefaultSplash())).toBe(false);
        expect(splash.show(enabledSplash(0))).toBe(false);
        expect(renderer.calls).toEqual([]);
    });

    it('replaces a splash that is still shown', () => {
        const renderer = new RecordingRenderer();
        const splash = new SplashController(renderer, silentLogger);

        splash.show(enabledSplash(500));
        vi.advanceTimersByTime(200);
        splash.show(enabledSplash(500));
        vi.advanceTimersByTime(500);

        expect(renderer.calls.map((call) => call.method)).toEqual([
            'create', 'restyle', 'destroy', 'create', 'restyle', 'destroy',
        ]);
        expect(renderer.liveHandles().size).toBe(0);
    });

    it('warns when the image cannot be shown', () => {
        const logger = createLogger();
        const splash = new SplashController(new RecordingRenderer({canCreate: () => false}), logger);

        expect(splash.show(enabledSplash(500))).toBe(false);
        expect(logger.warn).toHaveBeenCalledWith('Splash image "/tmp/splash.png" could not be shown');
        expect(splash.isVisible()).toBe(false);
    });
});

describe('SignalFlags', () => {
    it('sets flags from signals', () => {
        const target = new EventEmitter();
        const flags = new SignalFlags(target, silentLogger);

        target.emit('SIGHUP');
        expect(flags.consumeReload()).toBe(true);
        expect(flags.consumeReload()).toBe(false);
        expect(flags.shouldStop).toBe(false);

        target.emit('SIGTERM');
        expect(flags.shouldStop).toBe(true);
    });

    it('accepts requests without a signal', () => {
        const flags = new SignalFlags(new EventEmitter(), silentLogger);

        flags.requestReload();
        flags.requestStop();

        expect(flags.consumeReload()).toBe(true);
        expect(flags.shouldStop).toBe(true);
    });

    it('removes its handlers on dispose', () => {
        const target = new EventEmitter();
        const flags = new SignalFlags(target, silentLogger);
        expect(target.listenerCount('SIGINT')).toBe(1);

        flags.dispose();
        flags.dispose();

        expect(target.listenerCount('SIGINT')).toBe(0);
        expect(target.listenerCount('SIGTERM')).toBe(0);
        expect(target.listenerCount('SIGHUP')).toBe(0);
    });
});

describe('stats', () => {
    it('formats timings', () => {
        const text = formatStats(
            {fps: 30, workMs: 2, loopMs: 33, idleMs: 31},
            {width: 1920, height: 1080, osdX: 10, osdY: 20, activeAssets: 2, totalAssets: 3},
        );

        expect(text).toBe('OSD 1920x1080 @ 10,20\nAssets 2/3\nFPS 30 | work 2ms | loop 33ms | idle 31ms');
    });

    it('appends the first channels when asked', () => {
        const channels = new ChannelStore();
        channels.setValue(0, 0.9);
        channels.setText(1, 'gps');

        const lines = formatStats(
            {fps: 0, workMs: 0, loopMs: 0, idleMs: 0},
            {width: 1280, height: 720, osdX: 0, osdY: 0, activeAssets: 1, totalAssets: 1, channels},
        ).split('\n');

        expect(lines.slice(3)).toEqual([
            'UDP values:',
            ' v0=0.90', ' v1=0.00', ' v2=0.00', ' v3=0.00', ' v4=0.00', ' v5=0.00', ' v6=0.00', ' v7=0.00',
            'UDP texts:',
            ' t0=-', ' t1=gps', ' t2=-', ' t3=-', ' t4=-', ' t5=-', ' t6=-', ' t7=-',
        ]);
    });

    it('computes FPS over the report window', () => {
        let clock = 0;
        const tracker = new StatsTracker(() => clock);

        tracker.recordIteration({workMs: 1.4, loopMs: 2.6, idleMs: 0.5});
        clock = 100;
        expect(tracker.shouldReport()).toBe(false);

        clock = 500;
        expect(tracker.shouldReport()).toBe(true);
        expect(tracker.snapshot()).toEqual({fps: 2, workMs: 1, loopMs: 3, idleMs: 1});
        expect(tracker.shouldReport()).toBe(false);

        tracker.reset();
        expect(tracker.snapshot()).toEqual({fps: 0, workMs: 0, loopMs: 0, idleMs: 0});
    });
});

describe('telemetry', () => {
    it('yields the load averages once per round', () => {
        const source = new LoadAverageSource(16, () => [0.42, 0.3, 0.25]);

        expect(source.poll()).toEqual({channel: 16, value: 0.42});
        expect(source.poll()).toEqual({channel: 16, value: '0.42 0.30 0.25'});
        expect(source.poll()).toBeUndefined();
        expect(source.poll()).toEqual({channel: 16, value: 0.42});
    });

    it('polls sources at most once per interval', () => {
        let clock = 0;
        const read = vi.fn(() => [0.42, 0.3, 0.25]);
        const channels = new ChannelStore();
        const poller = new TelemetryPoller([new LoadAverageSource(16, read)], {now: () => clock, logger: silentLogger});

        expect(poller.pollDue(channels)).toBe(true);
        expect(channels.getValue(16)).toBe(0.42);
        expect(channels.getText(16)).toBe('0.42 0.30 0.25');

        clock = 500;
        expect(poller.pollDue(channels)).toBe(false);
        expect(read).toHaveBeenCalledTimes(1);

        clock = 1000;
        expect(poller.pollDue(channels)).toBe(false);
        expect(read).toHaveBeenCalledTimes(2);
    });

    it('is never due without sources', () => {
        expect(new TelemetryPoller([]).isDue()).toBe(false);
    });

    it('ignores samples outside the local range', () => {
        const logger = createLogger();
        let sent = false;
        const source: TelemetrySource = {
            name: 'stray',
            poll: () => {
                if (sent) return undefined;
                sent = true;
                return {channel: 3, value: 1};
            },
        };
        const channels = new ChannelStore();

        expect(new TelemetryPoller([source], {logger}).pollDue(channels)).toBe(false);
        expect(channels.getValue(3)).toBe(0);
        expect(logger.debug).toHaveBeenCalledWith('Telemetry source stray wrote outside the local range: 3');
    });

    it('bounds the samples taken from one source', () => {
        let count = 0;
        const source: TelemetrySource = {name: 'noisy', poll: () => ({channel: 17, value: count++})};
        const channels = new ChannelStore();

        new TelemetryPoller([source], {maxSamplesPerSource: 4, logger: silentLogger}).pollDue(channels);

        expect(count).toBe(4);
        expect(channels.getValue(17)).toBe(3);
    });
});

describe('HotReloadController', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    const setup = (configs: OverlayConfig[]) => {
        let clock = 5000;
        const now = () => clock;
        const logger = createLogger();
        const renderer = new RecordingRenderer();
        const engine = new ReconciliationEngine(renderer, {logger: silentLogger});
        const scheduler = new PushScheduler({now});
        const stats = new StatsTracker(now);
        const splash = new SplashController(renderer, silentLogger);
        let loads = 0;
        const loadConfig = () => configs[Math.min(loads++, configs.length - 1)] ?? defaultConfig();
        const reloader = new HotReloadController({engine, splash, scheduler, stats, loadConfig, logger});
        return {renderer, engine, scheduler, stats, splash, reloader, logger, advance: (ms: number) => (clock += ms)};
    };

    it('applies a config in one pass', () => {
        const {renderer, scheduler, splash, reloader} = setup([]);
        const config: OverlayConfig = {...defaultConfig(), idleMs: 250, splash: enabledSplash(500)};

        const ops = reloader.apply(config);

        expect(ops.map((op) => op.type)).toEqual(['create', 'restyle', 'setPercent']);
        expect(renderer.calls.map((call) => call.method)).toEqual(['create', 'restyle', 'setPercent', 'create', 'restyle']);
        expect(splash.isVisible()).toBe(true);
        expect(scheduler.idleCap).toBe(250);
        expect(scheduler.snapshot().lastPushTime).toBe(5000);
        expect(reloader.config).toBe(config);
        expect(reloader.reloadCount).toBe(0);
    });

    it('tears everything down and rebuilds with the current channels', () => {
        const next: OverlayConfig = {...defaultConfig(), assets: [createDefaultDescriptor(4)]};
        const {renderer, engine, stats, splash, reloader, logger, advance} = setup([next]);
        reloader.apply({...defaultConfig(), splash: enabledSplash(500)});
        engine.channels.setValue(4, 0.7);
        stats.recordIteration({workMs: 3, loopMs: 5, idleMs: 2});
        stats.recordIteration({workMs: 3, loopMs: 5, idleMs: 2});
        advance(100);
        renderer.reset();

        reloader.reload();

        expect(renderer.calls.slice(0, 2)).toEqual([
            {method: 'destroy', handle: 2},
            {method: 'destroy', handle: 1},
        ]);
        expect(renderer.calls.slice(2).map((call) => call.method)).toEqual(['create', 'restyle', 'setPercent']);
        expect(renderer.calls[4]).toEqual({method: 'setPercent', handle: 3, percent: 70});
        expect([...renderer.liveHandles().values()]).toEqual([4]);
        expect(stats.snapshot()).toEqual({fps: 0, workMs: 0, loopMs: 0, idleMs: 0});
        expect(splash.isVisible()).toBe(false);
        expect(reloader.reloadCount).toBe(1);
        expect(logger.info).toHaveBeenCalledWith('Config reloaded: 1 asset(s)');
    });

    it('warns about assets that cannot be loaded', () => {
        const {reloader, logger} = setup([]);

        reloader.apply({...defaultConfig(), assets: [createDefaultDescriptor(0), createDefaultDescriptor(0)]});

        expect(logger.warn).toHaveBeenCalledWith('Asset 0 not loaded: duplicate id or registry full');
    });
});

describe('OverlayRuntime', () => {
    const setup = (options: {config?: OverlayConfig; telemetry?: TelemetrySource[]} = {}) => {
        let clock = 1000;
        const source = new FakeSource();
        const renderer = new RecordingRenderer();
        const signals = new EventEmitter();
        const statsSink = vi.fn<[string], void>();
        const logger = createLogger();
        const loadConfig = vi.fn(() => options.config ?? defaultConfig());
        const runtime = new OverlayRuntime({
            renderer,
            source,
            loadConfig,
            signals,
            statsSink,
            telemetry: options.telemetry,
            now: () => clock,
            logger,
        });
        return {
            runtime,
            source,
            renderer,
            signals,
            statsSink,
            logger,
            loadConfig,
            setClock: (ms: number) => (clock = ms),
        };
    };

    it('shows the configured assets on start', async () => {
        const {runtime, source, renderer, logger} = setup();

        await runtime.start();

        expect(source.listened).toBe(true);
        expect(renderer.calls.map((call) => call.method)).toEqual(['create', 'restyle', 'setPercent']);
        expect(logger.info).toHaveBeenCalledWith('Overlay ready: 1 asset(s), idle 100ms');
        await runtime.close();
    });

    it('coalesces a datagram into the next push window', async () => {
        const {runtime, source, renderer, setClock} = setup();
        await runtime.start();
        renderer.reset();

        source.push('{"values":[0.9]}');
        await runtime.step();
        expect(renderer.calls).toEqual([]);

        setClock(1040);
        await runtime.step();

        expect(renderer.calls).toEqual([{method: 'setPercent', handle: 1, percent: 90}]);
        expect(source.waits).toEqual([100, 0]);
        await runtime.close();
    });

    it('applies only the newest datagram of a burst', async () => {
        const {runtime, source, renderer, setClock} = setup();
        await runtime.start();
        renderer.reset();
        setClock(1100);

        source.push('{"values":[0.2]}');
        source.push('{"values":[0.7]}');
        await runtime.step();

        expect(renderer.calls).toEqual([{method: 'setPercent', handle: 1, percent: 70}]);
        await runtime.close();
    });

    it('feeds telemetry into bound assets', async () => {
        const config: OverlayConfig = {...defaultConfig(), assets: [{...createDefaultDescriptor(0), valueIndex: 16}]};
        const {runtime, renderer, setClock} = setup({
            config,
            telemetry: [new LoadAverageSource(16, () => [0.75, 0.5, 0.25])],
        });
        await runtime.start();
        renderer.reset();

        await runtime.step();
        setClock(1040);
        await runtime.step();

        expect(renderer.calls).toEqual([{method: 'setPercent', handle: 1, percent: 75}]);
        expect(runtime.engine.channels.getText(16)).toBe('0.75 0.50 0.25');
        await runtime.close();
    });

    it('emits the stats text once per report interval', async () => {
        const {runtime, statsSink, setClock} = setup();
        await runtime.start();

        await runtime.step();
        setClock(1040);
        await runtime.step();
        expect(statsSink).not.toHaveBeenCalled();

        setClock(1300);
        await runtime.step();

        expect(statsSink).toHaveBeenCalledTimes(1);
        expect(statsSink).toHaveBeenCalledWith('OSD 1280x720 @ 0,0\nAssets 1/1\nFPS 10 | work 0ms | loop 0ms | idle 0ms');
        await runtime.close();
    });

    it('dumps channels in the stats text when enabled', async () => {
        const {runtime, source, statsSink, setClock} = setup({config: {...defaultConfig(), udpStats: true}});
        await runtime.start();
        setClock(1300);

        source.push('{"values":[0.5],"texts":["gps"]}');
        await runtime.step();

        const [text] = statsSink.mock.calls[0] ?? [''];
        const lines = text.split('\n');
        expect(lines).toContain(' v0=0.50');
        expect(lines).toContain(' t0=gps');
        await runtime.close();
    });

    it('stays quiet when stats are off', async () => {
        const {runtime, statsSink, setClock} = setup({config: {...defaultConfig(), showStats: false}});
        await runtime.start();
        setClock(2000);

        await runtime.step();

        expect(statsSink).not.toHaveBeenCalled();
        await runtime.close();
    });

    it('reloads the config on SIGHUP', async () => {
        const {runtime, renderer, signals, loadConfig} = setup();
        await runtime.start();
        loadConfig.mockReturnValue({...defaultConfig(), assets: [createDefaultDescriptor(0), createDefaultDescriptor(1)]});
        renderer.reset();

        signals.emit('SIGHUP');
        await runtime.step();

        expect(renderer.calls.map((call) => call.method)).toEqual([
            'destroy', 'create', 'restyle', 'setPercent', 'create', 'restyle', 'setPercent',
        ]);
        expect(renderer.liveHandles()).toEqual(new Map([[2, 0], [3, 1]]));
        expect(runtime.reloader.reloadCount).toBe(1);
        await runtime.close();
    });

    it('logs socket errors and keeps going', async () => {
        const {runtime, source, logger} = setup();
        await runtime.start();

        source.emit('error', new Error('ECONNREFUSED'));
        await runtime.step();

        expect(logger.warn).toHaveBeenCalledWith('ECONNREFUSED');
        await runtime.close();
    });

    it('fails to start when the socket cannot be bound', async () => {
        const {runtime, source, signals, loadConfig} = setup();
        const error = new OverlayError({
            message: 'Failed to bind overlay socket: EADDRINUSE',
            domain: 'transport',
            code: 'BIND_FAILED',
        });
        source.bindError = error;

        await expect(runtime.start()).rejects.toBe(error);
        expect(source.closed).toBe(true);
        expect(loadConfig).not.toHaveBeenCalled();
        expect(signals.listenerCount('SIGINT')).toBe(0);
    });

    it('runs until stopped, then releases everything', async () => {
        const {runtime, source, renderer, signals} = setup();
        source.onWait = () => {
            if (source.waits.length === 2) signals.emit('SIGTERM');
        };

        await runtime.run();

        expect(source.waits).toHaveLength(2);
        expect(source.closed).toBe(true);
        expect(renderer.liveHandles().size).toBe(0);
        expect(signals.listenerCount('SIGTERM')).toBe(0);
        expect(signals.listenerCount('SIGHUP')).toBe(0);
    });
});
