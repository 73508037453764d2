/**
 * Configuration (re)load.
 * @module runtime/HotReloadController
 */
import type {ReconciliationEngine} from '../core/ReconciliationEngine';
import type {Logger} from '../core/logger';
import type {RenderOp} from '../render/types';
import type {OverlayConfig} from './config';
import type {PushScheduler} from './PushScheduler';
import type {SplashController} from './Splash';
import type {StatsTracker} from './stats';

export type HotReloadDependencies = {
    engine: ReconciliationEngine;
    splash: SplashController;
    scheduler: PushScheduler;
    stats: StatsTracker;
    /** Produce a fresh config; called on every reload. */
    loadConfig: () => OverlayConfig;
    logger?: Logger;
};

/**
 * Rebuilds every asset from configuration in one synchronous pass, so no
 * other part of the loop sees a half-built registry.
 */
export class HotReloadController {
    private current: OverlayConfig | undefined;
    private reloads = 0;
    private readonly logger: Logger;

    constructor(private readonly deps: HotReloadDependencies) {
        this.logger = deps.logger ?? console;
    }

    /** Config applied last. */
    public get config(): OverlayConfig | undefined {
        return this.current;
    }

    /** Number of completed reloads, the initial load excluded. */
    public get reloadCount(): number {
        return this.reloads;
    }

    /** Tear everything down and apply a freshly loaded config. */
    public reload(): RenderOp[] {
        const {engine, splash, loadConfig} = this.deps;
        splash.clear();
        engine.destroyAll();
        const ops = this.apply(loadConfig());
        this.reloads++;
        this.logger.info(`Config reloaded: ${this.deps.engine.registry.size} asset(s)`);
        return ops;
    }

    /**
     * Replace the registry with the assets of `config`, create their visuals
     * with the current channel contents and show the splash.
     */
    public apply(config: OverlayConfig): RenderOp[] {
        const {engine, splash, scheduler, stats} = this.deps;
        this.current = config;
        for (const rejected of engine.load(config.assets)) {
            this.logger.warn(`Asset ${rejected.id} not loaded: duplicate id or registry full`);
        }
        const ops = engine.flush();
        scheduler.recordPush();
        stats.reset();
        scheduler.setIdleCap(config.idleMs);
        splash.show(config.splash);
        return ops;
    }
}
