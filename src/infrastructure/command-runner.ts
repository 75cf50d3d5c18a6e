import { execFile } from 'child_process';
import { logger } from '@/utils/logger';

export interface CommandRunner {
    run(command: string, args: readonly string[]): Promise<void>;
}

/**
 * Runs an external program to completion, capturing its output.
 * Rejects when the program cannot start or exits with a non-zero code.
 */
export class ExecFileCommandRunner implements CommandRunner {
    constructor(private readonly timeoutMs = 10 * 60 * 1000) {}

    run(command: string, args: readonly string[]): Promise<void> {
        logger.debug('Running command', { command, args });

        return new Promise((resolve, reject) => {
            execFile(
                command,
                [...args],
                { timeout: this.timeoutMs, maxBuffer: 16 * 1024 * 1024 },
                (error, _stdout, stderr) => {
                    if (error) {
                        const detail = String(stderr).trim().split('\n').slice(-5).join('\n');
                        reject(
                            new Error(
                                `${command} exited with ${error.code ?? 'error'}: ${detail || error.message}`,
                            ),
                        );
                        return;
                    }
                    resolve();
                },
            );
        });
    }
}
