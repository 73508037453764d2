/**
 * The overlay main loop.
 * @module runtime/OverlayRuntime
 */
import {ReconciliationEngine} from '../core/ReconciliationEngine';
import type {Logger} from '../core/logger';
import type {Renderer} from '../render/types';
import {decodeDatagram} from '../wire/decoder';
import {DatagramReceiver, type DatagramSource} from '../wire/receiver';
import {DEFAULT_CONFIG_PATH, loadConfig, type OverlayConfig} from './config';
import {HotReloadController} from './HotReloadController';
import {PushScheduler} from './PushScheduler';
import {SignalFlags, type SignalTarget} from './signals';
import {SplashController} from './Splash';
import {StatsTracker} from './stats';
import {TelemetryPoller, type TelemetrySource} from './telemetry';

/** A datagram source that reports socket errors. */
export type ObservableDatagramSource = DatagramSource & {
    on(event: 'error', listener: (err: Error) => void): unknown;
};

export type OverlayRuntimeOptions = {
    renderer: Renderer;
    /** Datagram source. A receiver on `port` if omitted. */
    source?: ObservableDatagramSource;
    /** UDP port of the default receiver. */
    port?: number;
    /** Config file read on start and on every reload. */
    configPath?: string;
    /** Overrides reading `configPath`. */
    loadConfig?: () => OverlayConfig;
    telemetry?: TelemetrySource[];
    /** Where SIGINT/SIGTERM/SIGHUP come from. Defaults to `process`. */
    signals?: SignalTarget;
    /** Receives the stats text. Defaults to `logger.info`. */
    statsSink?: (text: string) => void;
    now?: () => number;
    logger?: Logger;
};

/**
 * Single cooperative loop: wait for a datagram, apply the newest one, poll
 * telemetry, flush when the scheduler allows it.
 */
export class OverlayRuntime {
    public readonly engine: ReconciliationEngine;
    public readonly scheduler: PushScheduler;
    public readonly signals: SignalFlags;
    public readonly splash: SplashController;
    public readonly stats: StatsTracker;
    public readonly reloader: HotReloadController;
    private readonly source: ObservableDatagramSource;
    private readonly telemetry: TelemetryPoller;
    private readonly statsSink: (text: string) => void;
    private readonly now: () => number;
    private readonly logger: Logger;
    private readonly loadConfig: () => OverlayConfig;
    private started = false;
    private closed = false;

    constructor(options: OverlayRuntimeOptions) {
        this.logger = options.logger ?? console;
        this.now = options.now ?? Date.now;
        const logger = this.logger;
        const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
        this.loadConfig = options.loadConfig ?? (() => loadConfig(configPath, logger));

        this.source = options.source ?? new DatagramReceiver({port: options.port});
        this.engine = new ReconciliationEngine(options.renderer, {logger});
        this.scheduler = new PushScheduler({now: this.now});
        this.signals = new SignalFlags(options.signals ?? process, logger);
        this.splash = new SplashController(options.renderer, logger);
        this.stats = new StatsTracker(this.now);
        this.telemetry = new TelemetryPoller(options.telemetry ?? [], {now: this.now, logger});
        this.statsSink = options.statsSink ?? ((text) => logger.info(text));
        this.reloader = new HotReloadController({
            engine: this.engine,
            splash: this.splash,
            scheduler: this.scheduler,
            stats: this.stats,
            loadConfig: this.loadConfig,
            logger,
        });

        this.source.on('error', (err) => logger.warn(err.message));
    }

    /** Config in effect. */
    public get config(): OverlayConfig | undefined {
        return this.reloader.config;
    }

    /**
     * Bind the socket, load config and show the initial visuals.
     * @throws OverlayError `BIND_FAILED`.
     */
    public async start(): Promise<void> {
        if (this.started) return;
        try {
            await this.source.listen();
        } catch (err) {
            this.closed = true;
            this.signals.dispose();
            await this.source.close();
            throw err;
        }
        this.started = true;
        const config = this.loadConfig();
        this.reloader.apply(config);
        this.logger.info(`Overlay ready: ${config.assets.length} asset(s), idle ${config.idleMs}ms`);
    }

    /** One loop iteration. */
    public async step(): Promise<void> {
        if (this.signals.consumeReload()) {
            this.reloader.reload();
        }
        const loopStart = this.now();

        const waitStart = this.now();
        const ready = await this.source.waitForDatagram(this.scheduler.nextWait());
        const idleMs = Math.min(this.now() - waitStart, this.scheduler.idleCap);

        const workStart = this.now();
        const datagram = ready ? this.source.takeLatest() : undefined;
        if (datagram && this.engine.applyDatagram(decodeDatagram(datagram))) {
            this.scheduler.markDirty();
        }
        if (this.telemetry.pollDue(this.engine.channels)) {
            this.scheduler.markDirty();
        }
        if (this.scheduler.shouldPush()) {
            this.engine.flush();
            this.scheduler.recordPush();
        }
        const end = this.now();
        this.stats.recordIteration({workMs: end - workStart, loopMs: end - loopStart, idleMs});

        const config = this.reloader.config;
        if (config?.showStats && this.stats.shouldReport()) {
            this.statsSink(
                this.stats.report({
                    width: config.width,
                    height: config.height,
                    osdX: config.osdX,
                    osdY: config.osdY,
                    activeAssets: this.engine.registry.all().filter((entry) => entry.descriptor.enabled).length,
                    totalAssets: this.engine.registry.size,
                    channels: config.udpStats ? this.engine.channels : undefined,
                }),
            );
        }
    }

    /** Start, loop until a stop is requested, then close. */
    public async run(): Promise<void> {
        await this.start();
        try {
            while (!this.signals.shouldStop) {
                await this.step();
            }
        } finally {
            await this.close();
        }
    }

    /** Ask the loop to end after the current iteration. */
    public stop(): void {
        this.signals.requestStop();
    }

    /** Remove every visual and release the socket and signal handlers. */
    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.splash.clear();
        this.engine.destroyAll();
        this.signals.dispose();
        await this.source.close();
    }
}
