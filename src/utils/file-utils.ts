/**
 * File system helpers
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Write text to a sibling temp file, then rename it over the target
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    try {
        await fs.writeFile(tempPath, content, 'utf8');
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
