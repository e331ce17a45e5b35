import fs from 'node:fs';
import path from 'node:path';
import type { NotesFsPort } from '../../domain/ports/NotesFsPort.js';

export class FileSystemNotesAdapter implements NotesFsPort {
  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  isFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  isDirectory(dirPath: string): boolean {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch {
      return false;
    }
  }

  isSameFile(a: string, b: string): boolean {
    try {
      const sa = fs.statSync(a);
      const sb = fs.statSync(b);
      return sa.dev === sb.dev && sa.ino === sb.ino;
    } catch {
      return false;
    }
  }

  readText(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  writeText(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  }

  copyFile(from: string, to: string): void {
    fs.copyFileSync(from, to);
  }

  /** 跨裝置時 renameSync 會失敗（EXDEV），改以複製後刪除 */
  renameFile(from: string, to: string): void {
    fs.mkdirSync(path.dirname(to), { recursive: true });
    try {
      fs.renameSync(from, to);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
      fs.copyFileSync(from, to, fs.constants.COPYFILE_EXCL);
      fs.unlinkSync(from);
    }
  }

  removeFile(filePath: string): void {
    fs.unlinkSync(filePath);
  }

  ensureDirectory(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}
