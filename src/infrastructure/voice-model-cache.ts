import * as fs from 'fs';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import AdmZip from 'adm-zip';
import { VoiceModelPackage } from '@/domain/article';
import { ConfigurationError, ModelDownloadError, ModelNotFoundError } from '@/domain/errors';
import { FetchFn, USER_AGENT } from '@/utils/http';
import { logger } from '@/utils/logger';

const WEIGHTS_EXTENSION = '.pth';
const INDEX_EXTENSION = '.index';
const ARCHIVE_NAME = 'model.zip';

export interface VoiceModelCacheOptions {
    cacheDir: string;
    modelUrl: string | null;
    downloadTimeoutMs?: number;
    fetchFn?: FetchFn;
}

export interface VoiceModelProvider {
    ensureAvailable(): Promise<VoiceModelPackage>;
}

/**
 * Keeps one voice-conversion model package on local disk.
 *
 * Once a weights file exists anywhere under the cache directory the remote
 * source is never contacted again. Concurrent runs sharing a directory are
 * not synchronized.
 */
export class VoiceModelCache implements VoiceModelProvider {
    private readonly fetchFn: FetchFn;

    constructor(private readonly options: VoiceModelCacheOptions) {
        this.fetchFn = options.fetchFn ?? fetch;
    }

    async ensureAvailable(): Promise<VoiceModelPackage> {
        const { cacheDir, modelUrl } = this.options;
        await fs.promises.mkdir(cacheDir, { recursive: true });

        const cached = await this.scan();
        if (cached) {
            logger.info('Voice model found in cache', { weightsPath: cached.weightsPath });
            return cached;
        }

        if (!modelUrl) {
            throw new ConfigurationError(
                `No voice model in ${cacheDir} and no model source URL is configured`,
            );
        }

        const archivePath = path.join(cacheDir, ARCHIVE_NAME);
        try {
            await this.download(modelUrl, archivePath);
            logger.info('Extracting voice model archive', { archivePath, cacheDir });
            new AdmZip(archivePath).extractAllTo(cacheDir, true);
        } finally {
            await fs.promises.rm(archivePath, { force: true });
        }

        const extracted = await this.scan();
        if (!extracted) {
            throw new ModelNotFoundError(`No ${WEIGHTS_EXTENSION} weights file found in archive`);
        }

        logger.info('Voice model ready', {
            weightsPath: extracted.weightsPath,
            indexPath: extracted.indexPath,
        });
        return extracted;
    }

    /**
     * `downloadTimeoutMs` bounds the wait for the response and each gap between
     * chunks, not the whole transfer.
     */
    private async download(url: string, targetPath: string): Promise<void> {
        logger.info('Downloading voice model', { url });

        const idleTimeoutMs = this.options.downloadTimeoutMs ?? 120000;
        const controller = new AbortController();
        let timer = setTimeout(() => controller.abort(), idleTimeoutMs);
        const resetTimer = () => {
            clearTimeout(timer);
            timer = setTimeout(() => controller.abort(), idleTimeoutMs);
        };

        try {
            const response = await this.fetchFn(url, {
                redirect: 'follow',
                headers: { 'User-Agent': USER_AGENT },
                signal: controller.signal,
            });
            resetTimer();

            if (!response.ok) {
                throw new ModelDownloadError(
                    `Model download failed with HTTP ${response.status}`,
                    response.status,
                );
            }
            if (!response.body) {
                throw new ModelDownloadError('Model download returned an empty body', response.status);
            }

            const progress = new Transform({
                transform(chunk: Buffer, _encoding, callback) {
                    resetTimer();
                    callback(null, chunk);
                },
            });
            await pipeline(Readable.fromWeb(response.body), progress, fs.createWriteStream(targetPath));
        } catch (error) {
            if (controller.signal.aborted) {
                throw new ModelDownloadError(`Model download stalled: no data for ${idleTimeoutMs} ms`);
            }
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }

    private async scan(): Promise<VoiceModelPackage | null> {
        const files = await this.listFiles(this.options.cacheDir);
        const weightsPath = files.find((file) => file.endsWith(WEIGHTS_EXTENSION));
        if (!weightsPath) {
            return null;
        }
        const indexPath = files.find((file) => file.endsWith(INDEX_EXTENSION)) ?? null;
        return { weightsPath, indexPath };
    }

    private async listFiles(dir: string): Promise<string[]> {
        const entries = await fs.promises.readdir(dir, { withFileTypes: true });
        entries.sort((a, b) => a.name.localeCompare(b.name));

        const files: string[] = [];
        const subdirs: string[] = [];
        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                subdirs.push(fullPath);
            } else if (entry.isFile()) {
                files.push(fullPath);
            }
        }

        // Top-level files first, then nested directories.
        for (const subdir of subdirs) {
            files.push(...(await this.listFiles(subdir)));
        }
        return files;
    }
}
