/**
 * Process signal flags. Handlers only set flags; the loop reads them once
 * per iteration.
 * @module runtime/signals
 */
import type {Logger} from '../core/logger';

/** Minimal signal emitter, `process` in production. */
export type SignalTarget = {
    on(signal: NodeJS.Signals, listener: () => void): unknown;
    off(signal: NodeJS.Signals, listener: () => void): unknown;
};

export const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
export const RELOAD_SIGNAL: NodeJS.Signals = 'SIGHUP';

export class SignalFlags {
    private stopRequested = false;
    private reloadRequested = false;
    private readonly onStop = () => {
        this.logger.info('Stop requested');
        this.stopRequested = true;
    };
    private readonly onReload = () => {
        this.logger.info('Reload requested');
        this.reloadRequested = true;
    };
    private attached = true;

    constructor(
        private readonly target: SignalTarget = process,
        private readonly logger: Logger = console,
    ) {
        for (const signal of STOP_SIGNALS) target.on(signal, this.onStop);
        target.on(RELOAD_SIGNAL, this.onReload);
    }

    public get shouldStop(): boolean {
        return this.stopRequested;
    }

    public requestStop(): void {
        this.stopRequested = true;
    }

    public requestReload(): void {
        this.reloadRequested = true;
    }

    /** Read and reset the reload flag. */
    public consumeReload(): boolean {
        const requested = this.reloadRequested;
        this.reloadRequested = false;
        return requested;
    }

    /** Remove the signal handlers. */
    public dispose(): void {
        if (!this.attached) return;
        this.attached = false;
        for (const signal of STOP_SIGNALS) this.target.off(signal, this.onStop);
        this.target.off(RELOAD_SIGNAL, this.onReload);
    }
}
