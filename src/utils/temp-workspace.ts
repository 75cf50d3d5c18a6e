import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from './logger';

/**
 * A private temporary directory owned by one article's pipeline run.
 * Everything written under it is removed by `dispose()`.
 */
export class TempWorkspace {
    private disposed = false;

    private constructor(readonly dir: string) {}

    static async create(prefix = 'briefing-', root: string = os.tmpdir()): Promise<TempWorkspace> {
        const dir = await fs.promises.mkdtemp(path.join(root, prefix));
        return new TempWorkspace(dir);
    }

    file(name: string): string {
        return path.join(this.dir, name);
    }

    async dispose(): Promise<void> {
        if (this.disposed) {
            return;
        }
        this.disposed = true;

        try {
            await fs.promises.rm(this.dir, { recursive: true, force: true });
        } catch (error) {
            logger.warn('Failed to remove temporary workspace', {
                dir: this.dir,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}
