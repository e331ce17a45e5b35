import fs from 'node:fs';
import path from 'node:path';
import type { DirectoryScanner, ScanFilter, ScanListing } from '../../domain/ports/DirectoryScanner.js';
import { hasNoteExtension, matchesJunkPattern } from '../../shared/PathUtils.js';
import { errorMessage } from '../../domain/errors/DomainErrors.js';

/** 讀取單一目錄的項目 */
export type ReadDirectory = (dir: string) => fs.Dirent[];

const readDirectory: ReadDirectory = (dir) => fs.readdirSync(dir, { withFileTypes: true });

/** 純 in-process 遞迴走訪 */
export class WalkDirectoryScanner implements DirectoryScanner {
  readonly name = 'walk';

  constructor(private readonly readDir: ReadDirectory = readDirectory) {}

  listFiles(root: string, filter: ScanFilter): ScanListing {
    const listing: ScanListing = { files: [], warnings: [] };
    if (!fs.existsSync(root)) return listing;
    this.walkDir(root, '', filter, listing);
    return listing;
  }

  /** 遞迴走訪目錄；無法讀取的子目錄記錄為 warning 後略過 */
  private walkDir(dir: string, prefix: string, filter: ScanFilter, listing: ScanListing): void {
    let entries: fs.Dirent[];
    try {
      entries = this.readDir(dir);
    } catch (err) {
      listing.warnings.push({ path: dir, reason: errorMessage(err) });
      return;
    }

    for (const entry of entries) {
      if (matchesJunkPattern(entry.name, filter.junkPatterns)) continue;
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        this.walkDir(path.join(dir, entry.name), rel, filter, listing);
      } else if (entry.isFile() && hasNoteExtension(entry.name, filter.extensions)) {
        listing.files.push(rel);
      }
    }
  }
}
