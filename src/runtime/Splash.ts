/**
 * Timed splash image.
 * @module runtime/Splash
 */
import type {Logger} from '../core/logger';
import type {RenderHandle, SplashDescriptor} from '../core/types';
import {resolveStyle} from '../render/resolve';
import type {Renderer} from '../render/types';

/** Shows one splash visual at a time and removes it when its duration ends. */
export class SplashController {
    private handle: RenderHandle | undefined;
    private timer: NodeJS.Timeout | undefined;

    constructor(
        private readonly renderer: Renderer,
        private readonly logger: Logger = console,
    ) {}

    /**
     * Replace any current splash with a new one.
     * @returns `true` when a visual was created.
     */
    public show(splash: SplashDescriptor): boolean {
        this.clear();
        if (!splash.enabled || splash.durationMs <= 0) return false;
        const handle = this.renderer.create(splash.asset);
        if (handle === undefined) {
            this.logger.warn(`Splash image "${splash.asset.imagePath}" could not be shown`);
            return false;
        }
        this.handle = handle;
        this.renderer.restyle(handle, resolveStyle(splash.asset));
        this.timer = setTimeout(() => this.clear(), splash.durationMs);
        return true;
    }

    /** Remove the splash now, if shown. */
    public clear(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        const handle = this.handle;
        this.handle = undefined;
        if (handle !== undefined) this.renderer.destroy(handle);
    }

    public isVisible(): boolean {
        return this.handle !== undefined;
    }
}
