// src/services/fileSystem.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { INPUT_FILE_EXTENSIONS } from '../config/constants';
import { InputDirectoryNotFoundError } from '../types/errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Orders paths segment by segment, so `a/b.json` sorts before `a-c.json`.
 */
export function comparePathSegments(left: string, right: string): number {
    const leftParts = left.split(path.sep);
    const rightParts = right.split(path.sep);
    const length = Math.min(leftParts.length, rightParts.length);
    for (let i = 0; i < length; i++) {
        if (leftParts[i] < rightParts[i]) return -1;
        if (leftParts[i] > rightParts[i]) return 1;
    }
    return leftParts.length - rightParts.length;
}

/**
 * True for `.json` / `.jsonl`, whatever the case of the extension.
 */
export function isInputFile(filePath: string): boolean {
    return INPUT_FILE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

@singleton()
export class FileSystemService {
    constructor(
        @inject(LoggingService) private loggingService: LoggingService,
    ) { }

    private get serviceBaseLogger(): Logger {
        return this.loggingService.getLogger({ service: 'FileSystemService' });
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.serviceBaseLogger;
        return base.child({ serviceMethod: `FileSystemService.${methodName}` });
    }

    /**
     * Fails unless `dirPath` exists and is a directory.
     *
     * @throws {InputDirectoryNotFoundError}
     */
    async assertDirectory(dirPath: string): Promise<void> {
        let stats: fs.Stats;
        try {
            stats = await fs.promises.stat(dirPath);
        } catch (statError: unknown) {
            throw new InputDirectoryNotFoundError(dirPath, { cause: statError instanceof Error ? statError.message : String(statError) });
        }
        if (!stats.isDirectory()) {
            throw new InputDirectoryNotFoundError(dirPath, { cause: 'not a directory' });
        }
    }

    async listDirectory(dirPath: string): Promise<fs.Dirent[]> {
        return fs.promises.readdir(dirPath, { withFileTypes: true });
    }

    /**
     * Recursively lists `.json` / `.jsonl` files under `rootDir`, in lexicographic path order.
     * Symlinked files count when their target is a regular file; symlinked directories are not followed.
     * A subdirectory that cannot be listed is logged and skipped.
     *
     * @throws {InputDirectoryNotFoundError} When `rootDir` is missing, not a directory or unreadable.
     */
    async discoverInputFiles(rootDir: string, parentLogger?: Logger): Promise<string[]> {
        const logger = this.getMethodLogger(parentLogger, 'discoverInputFiles');
        const root = path.resolve(rootDir);
        await this.assertDirectory(root);

        const found: string[] = [];
        const pending: string[] = [root];
        while (pending.length > 0) {
            const dir = pending.pop();
            if (dir === undefined) break;

            let entries: fs.Dirent[];
            try {
                entries = await this.listDirectory(dir);
            } catch (readError: unknown) {
                const { message } = getErrorMessageAndStack(readError);
                if (dir === root) {
                    throw new InputDirectoryNotFoundError(root, { cause: message });
                }
                logger.warn({ path: dir, err: readError, event: 'input_directory_unreadable' }, `Skipping unreadable directory ${dir}: ${message}`);
                continue;
            }

            for (const entry of entries) {
                const entryPath = path.join(dir, entry.name);
                if (entry.isDirectory()) {
                    pending.push(entryPath);
                } else if (entry.isFile() && isInputFile(entry.name)) {
                    found.push(path.relative(root, entryPath));
                } else if (entry.isSymbolicLink() && isInputFile(entry.name) && await this.isLinkToFile(entryPath, logger)) {
                    found.push(path.relative(root, entryPath));
                }
            }
        }

        const files = found.sort(comparePathSegments).map(relativePath => path.join(root, relativePath));
        logger.debug({ root, count: files.length, event: 'input_files_discovered' }, `Discovered ${files.length} input file(s).`);
        return files;
    }

    private async isLinkToFile(linkPath: string, logger: Logger): Promise<boolean> {
        try {
            return (await fs.promises.stat(linkPath)).isFile();
        } catch (statError: unknown) {
            const { message } = getErrorMessageAndStack(statError);
            logger.warn({ path: linkPath, event: 'input_symlink_unresolved' }, `Skipping unresolved link ${linkPath}: ${message}`);
            return false;
        }
    }

    async writeFile(filePath: string, content: string, parentLogger?: Logger, encoding: BufferEncoding = 'utf8'): Promise<void> {
        const logger = this.getMethodLogger(parentLogger, 'writeFile');
        const logContext = { filePath, encoding };
        logger.trace({ ...logContext, event: 'writeFile_start' });
        try {
            if (!filePath) throw new Error("File path cannot be empty for writeFile.");
            await this.ensureDirExists(path.dirname(filePath), logger);
            await fs.promises.writeFile(filePath, content, encoding);
            logger.trace({ ...logContext, contentLength: content.length, event: 'writeFile_success' });
        } catch (error) {
            logger.error({ ...logContext, err: error, event: 'writeFile_failed' });
            throw error;
        }
    }

    public async ensureDirExists(dirPath: string, parentLogger?: Logger): Promise<void> {
        const logger = this.getMethodLogger(parentLogger, 'ensureDirExists');
        try {
            if (!fs.existsSync(dirPath)) {
                logger.info({ path: dirPath, event: 'create_directory' }, `Creating directory.`);
                await fs.promises.mkdir(dirPath, { recursive: true });
            }
        } catch (mkdirError: unknown) {
            logger.error({ err: mkdirError, path: dirPath }, `Error creating directory`);
            throw mkdirError;
        }
    }
}
