import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type { FileDescriptor, ScanConfig } from '../types/index.js';
import { IMAGE_EXTENSIONS } from '../documents/document-loader.js';
import { getLogger } from '../utils/logger.js';

function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

/**
 * `relPath` is the excluded folder itself or lies inside it.
 */
export function isPathExcluded(relPath: string, excludedFolders: readonly string[]): boolean {
    const rel = toPosix(relPath).replace(/\\/g, '/');
    return excludedFolders.some((folder) => {
        const excluded = folder.replace(/\\/g, '/').replace(/\/+$/, '');
        return excluded.length > 0 && (rel === excluded || rel.startsWith(`${excluded}/`));
    });
}

/**
 * Files under `root` with a scanned extension, depth-first in name order.
 * Excluded folders are not entered.
 */
export async function listFiles(root: string, config: ScanConfig): Promise<string[]> {
    const extensions = new Set(config.extensions.map((ext) => ext.toLowerCase()));
    const files: string[] = [];

    async function walk(dir: string): Promise<void> {
        const entries = await readdir(dir, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (isPathExcluded(path.relative(root, full), config.excludedFolders)) {
                    getLogger().debug({ dir: full }, 'Skipping excluded directory');
                    continue;
                }
                await walk(full);
            } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
                files.push(full);
            }
        }
    }

    await walk(root);
    getLogger().info({ root, files: files.length }, 'Directory scanned');
    return files;
}

export async function computeSha256(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of createReadStream(filePath)) {
        hash.update(chunk);
    }
    return hash.digest('hex');
}

export async function describeFile(root: string, filePath: string): Promise<FileDescriptor> {
    const info = await stat(filePath);
    return {
        path: filePath,
        relPath: toPosix(path.relative(root, filePath)),
        filename: path.basename(filePath),
        size: info.size,
        mtime: info.mtimeMs / 1000,
        sha256: await computeSha256(filePath),
    };
}

/**
 * Images and PDFs named like a certificate go to the certificate flow.
 */
export function isCertificateCandidate(filePath: string, keywords: readonly string[]): boolean {
    const ext = path.extname(filePath).toLowerCase();
    if (IMAGE_EXTENSIONS.includes(ext)) return true;
    const filename = path.basename(filePath).toLowerCase();
    return keywords.some((keyword) => filename.includes(keyword.toLowerCase()));
}
