import { injectable } from 'inversify';
import { LOG_PREFIX } from '@/constants';

/**
 * Minimal lifecycle base: children register teardown callbacks while loaded,
 * and `unload()` runs them in reverse order exactly once.
 */
@injectable()
export abstract class Component {
    private readonly teardowns: Array<() => void> = [];
    private loaded = false;

    get isLoaded(): boolean {
        return this.loaded;
    }

    load(): void {
        if (this.loaded) return;
        this.loaded = true;
        this.onload();
    }

    unload(): void {
        if (!this.loaded) return;
        this.loaded = false;
        while (this.teardowns.length > 0) {
            const teardown = this.teardowns.pop();
            try {
                teardown?.();
            } catch (error) {
                console.error(`${LOG_PREFIX} Teardown callback failed.`, error);
            }
        }
        this.onunload();
    }

    register(teardown: () => void): void {
        this.teardowns.push(teardown);
    }

    protected onload(): void {}

    protected onunload(): void {}
}
