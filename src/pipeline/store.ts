import fs from 'fs-extra';

/**
 * The filesystem operations the pipeline's caching decisions depend on.
 * Stages receive a store instead of importing fs so tests can run them
 * against an in-memory tree.
 */
export interface FileStore {
    pathExists(p: string): Promise<boolean>;
    ensureDir(p: string): Promise<void>;
    // Entry names directly under `dir`; empty when the directory is missing
    readdir(dir: string): Promise<string[]>;
    readFile(p: string): Promise<string>;
    writeFile(p: string, data: string): Promise<void>;
}

export const diskStore: FileStore = {
    pathExists: (p) => fs.pathExists(p),
    ensureDir: (p) => fs.ensureDir(p),
    async readdir(dir) {
        if (!(await fs.pathExists(dir))) return [];
        return fs.readdir(dir);
    },
    readFile: (p) => fs.readFile(p, 'utf8'),
    writeFile: (p, data) => fs.writeFile(p, data, 'utf8'),
};
