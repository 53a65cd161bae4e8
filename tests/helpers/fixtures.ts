import * as fs from 'fs';
import * as path from 'path';

export const TRAFFIC_HEADER = 'Date,Version,Path,Views';
export const SEARCH_HEADER = 'Created Date,Query,Total Results';

/**
 * Join CSV lines with a trailing newline, the way exports are saved
 */
export function csv(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

/**
 * Write a file under root, creating parent folders
 */
export function writeFixture(root: string, relativePath: string, content: string): string {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
