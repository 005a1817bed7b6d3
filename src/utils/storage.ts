import * as fs from 'fs/promises';

/**
 * Free-space lookup, injectable so tests can simulate a full disk
 */
export interface IStorageProbe {
    /** Bytes available to this process in the filesystem holding `directory` */
    freeBytes(directory: string): Promise<number>;
}

/**
 * statfs-backed storage probe
 */
export class StatfsStorageProbe implements IStorageProbe {
    async freeBytes(directory: string): Promise<number> {
        const stats = await fs.statfs(directory);
        return stats.bavail * stats.bsize;
    }
}

/**
 * Create a directory and its parents
 */
export async function ensureDir(directory: string): Promise<void> {
    await fs.mkdir(directory, { recursive: true });
}

/**
 * Remove a directory tree; missing paths are not an error
 */
export async function removeDir(directory: string): Promise<void> {
    await fs.rm(directory, { recursive: true, force: true });
}

/**
 * Size of a file, or undefined when it does not exist
 */
export async function fileSize(filePath: string): Promise<number | undefined> {
    try {
        const stats = await fs.stat(filePath);
        return stats.size;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return undefined;
        }
        throw error;
    }
}
