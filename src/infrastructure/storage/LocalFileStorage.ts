import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { pipeline, Transform } from 'stream';
import {
    IFileStorage,
    SaveOptions,
    SaveProgress,
    SavedFile
} from '../../domain/interfaces/IFileStorage';
import { InternalError, ValidationError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

const pipelineAsync = promisify(pipeline);
const fsPromises = fs.promises;

/**
 * Files under a single base directory. The directory itself is created on
 * the first write, not at construction.
 */
export class LocalFileStorage implements IFileStorage {
    private baseDir: string;

    constructor(
        private logger: Logger,
        baseDir: string = 'downloads'
    ) {
        this.baseDir = path.resolve(baseDir);
    }

    async save(
        filePath: string,
        data: NodeJS.ReadableStream,
        options: SaveOptions = {}
    ): Promise<SavedFile> {
        const fullPath = this.resolve(filePath);
        const {
            overwrite = true,
            createDirectories = true,
            progressCallback
        } = options;

        if (!overwrite && await this.exists(filePath)) {
            throw new ValidationError(`File already exists: ${filePath}`, { path: fullPath });
        }

        if (createDirectories) {
            await this.createDirectory(path.dirname(filePath));
        }

        try {
            await this.saveStream(fullPath, data, progressCallback);
        } catch (error) {
            // leave no truncated file behind
            await fsPromises.rm(fullPath, { force: true });
            throw error;
        }

        const stats = await fsPromises.stat(fullPath);
        this.logger.debug(`File saved: ${fullPath} (${stats.size} bytes)`);

        return { path: fullPath, size: stats.size };
    }

    async exists(filePath: string): Promise<boolean> {
        const fullPath = this.resolve(filePath);

        try {
            await fsPromises.access(fullPath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async delete(filePath: string): Promise<void> {
        const fullPath = this.resolve(filePath);

        try {
            await fsPromises.unlink(fullPath);
            this.logger.debug(`File deleted: ${fullPath}`);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                // already gone
                return;
            }
            throw new InternalError(`Failed to delete file: ${errorMessage(error)}`, { path: fullPath });
        }
    }

    async createDirectory(dirPath: string): Promise<void> {
        const fullPath = this.resolve(dirPath);

        try {
            await fsPromises.mkdir(fullPath, { recursive: true });
        } catch (error) {
            throw new InternalError(`Failed to create directory: ${errorMessage(error)}`, { path: fullPath });
        }
    }

    /**
     * Absolute path below the base directory; rejects anything that escapes it
     */
    resolve(filePath: string): string {
        const resolved = path.resolve(this.baseDir, filePath);
        const relative = path.relative(this.baseDir, resolved);

        if (relative.startsWith('..') || path.isAbsolute(relative)) {
            throw new ValidationError('Path escapes the storage directory', { path: filePath });
        }

        return resolved;
    }

    getBaseDir(): string {
        return this.baseDir;
    }

    private async saveStream(
        fullPath: string,
        stream: NodeJS.ReadableStream,
        progressCallback?: (progress: SaveProgress) => void
    ): Promise<void> {
        const writeStream = fs.createWriteStream(fullPath);

        if (!progressCallback) {
            await pipelineAsync(stream, writeStream);
            return;
        }

        let savedBytes = 0;
        const counter = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                savedBytes += chunk.length;
                progressCallback({ savedBytes });
                callback(null, chunk);
            }
        });

        await pipelineAsync(stream, counter, writeStream);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
