import * as fs from 'fs';
import * as path from 'path';
import { SelectableList } from './selectable-list.js';

export type FileDialogType = 'openfile' | 'opendir' | 'saveas';

export type DirFs = Pick<typeof fs, 'readdirSync' | 'statSync' | 'existsSync' | 'mkdirSync' | 'writeFileSync'>;

export interface FileEntry {
  name: string;
  path: string;
  isDir: boolean;
}

export interface FileSelectOptions {
  dialogType?: FileDialogType;
  limitExtensions?: readonly string[];
  showHidden?: boolean;
  asciiIcons?: boolean;
  fs?: DirFs;
  debugLog?: (message: string) => void;
}

export type FileActionResult = { ok: true; path: string } | { ok: false; title: string; message: string };

const ASCII_ICONS = { dir: '<DIR>', file: '     ' };
const UNICODE_ICONS = { dir: '\u{1F4C1}', file: '\u{1F5CE}' };

const isPermissionError = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && (err.code === 'EACCES' || err.code === 'EPERM');

/**
 * Directory browsing state behind the file dialog: the current directory,
 * its listing (`..` first, then directories, then files) and the checks that
 * decide whether a selection can be returned.
 */
export class FileSelectModel {
  readonly dialogType: FileDialogType;
  readonly list = new SelectableList<FileEntry>();
  private currentDir: string;
  private readonly limitExtensions: readonly string[];
  private showHidden: boolean;
  private readonly icons: { dir: string; file: string };
  private readonly fsImpl: DirFs;
  private readonly debugLog: (message: string) => void;

  constructor(initialDir: string, options: FileSelectOptions = {}) {
    this.dialogType = options.dialogType ?? 'openfile';
    this.limitExtensions = options.limitExtensions ?? [];
    this.showHidden = options.showHidden ?? false;
    this.icons = options.asciiIcons === false ? UNICODE_ICONS : ASCII_ICONS;
    this.fsImpl = options.fs ?? fs;
    this.debugLog = options.debugLog ?? (() => {});
    this.currentDir = path.resolve(initialDir);
    this.refresh();
  }

  getCurrentDir(): string {
    return this.currentDir;
  }

  isShowingHidden(): boolean {
    return this.showHidden;
  }

  setShowHidden(showHidden: boolean): void {
    this.showHidden = showHidden;
    this.refresh();
  }

  label(entry: FileEntry): string {
    return `${entry.isDir ? this.icons.dir : this.icons.file} ${entry.name}`;
  }

  /** Re-read the current directory. Permission errors leave an empty listing and are rethrown. */
  refresh(): void {
    this.list.clear();
    const parent = path.dirname(this.currentDir);
    if (parent !== this.currentDir) {
      this.list.addItem({ name: '..', path: parent, isDir: true });
    }
    const dirs: FileEntry[] = [];
    const files: FileEntry[] = [];
    for (const name of this.fsImpl.readdirSync(this.currentDir).slice().sort()) {
      if (!this.showHidden && name.startsWith('.')) continue;
      const full = path.join(this.currentDir, name);
      if (this.isDirectory(full)) {
        dirs.push({ name, path: full, isDir: true });
      } else if (this.dialogType !== 'opendir' && this.matchesExtension(name)) {
        files.push({ name, path: full, isDir: false });
      }
    }
    this.list.addItemList(dirs);
    this.list.addItemList(files);
  }

  /** Enter a directory. Errors are returned for the dialog to show. */
  changeDirectory(target: string): FileActionResult {
    const resolved = path.resolve(this.currentDir, target);
    if (!this.fsImpl.existsSync(resolved) || !this.isDirectory(resolved)) {
      return { ok: false, title: 'Error', message: 'Selected directory does not exist!' };
    }
    const previous = this.currentDir;
    this.currentDir = resolved;
    try {
      this.refresh();
    } catch (err) {
      if (!isPermissionError(err)) throw err;
      this.currentDir = previous;
      this.refresh();
      return { ok: false, title: 'Error', message: `Permission Error Accessing: ${resolved}` };
    }
    return { ok: true, path: resolved };
  }

  /** Selected list entry, or undefined when the listing is empty. */
  getSelected(): FileEntry | undefined {
    return this.list.get();
  }

  createDirectory(name: string): FileActionResult {
    return this.create(name, target => this.fsImpl.mkdirSync(target));
  }

  createFile(name: string): FileActionResult {
    return this.create(name, target => this.fsImpl.writeFileSync(target, ''));
  }

  /**
   * Check a path chosen by the user against the dialog type. `saveas` accepts
   * any name inside an existing directory.
   */
  validateOutput(target: string | undefined): FileActionResult {
    if (!target) {
      return { ok: false, title: 'Error', message: 'No path is selected!' };
    }
    const resolved = path.resolve(this.currentDir, target);
    if (this.dialogType === 'saveas') {
      if (!this.fsImpl.existsSync(path.dirname(resolved))) {
        return { ok: false, title: 'Error', message: 'Please select a valid directory path!' };
      }
      return { ok: true, path: resolved };
    }
    const exists = this.fsImpl.existsSync(resolved);
    const isDir = exists && this.isDirectory(resolved);
    if (this.dialogType === 'opendir' && !isDir) {
      return { ok: false, title: 'Error', message: 'Please select a valid directory path!' };
    }
    if (this.dialogType === 'openfile' && (!exists || isDir)) {
      return { ok: false, title: 'Error', message: 'Please select a valid file path!' };
    }
    return { ok: true, path: resolved };
  }

  private create(name: string, make: (target: string) => void): FileActionResult {
    if (!name) return { ok: false, title: 'Error', message: 'No path is selected!' };
    const target = path.resolve(this.currentDir, name);
    if (this.fsImpl.existsSync(target)) {
      return { ok: false, title: 'Error', message: `${name} already exists!` };
    }
    try {
      make(target);
    } catch (err) {
      if (!isPermissionError(err)) throw err;
      return { ok: false, title: 'Error', message: 'Permission Error!' };
    }
    this.refresh();
    return { ok: true, path: target };
  }

  private matchesExtension(name: string): boolean {
    if (this.limitExtensions.length === 0) return true;
    return this.limitExtensions.includes(path.extname(name));
  }

  private isDirectory(target: string): boolean {
    try {
      return this.fsImpl.statSync(target).isDirectory();
    } catch (err) {
      this.debugLog(`stat failed for ${target}: ${String(err)}`);
      return false;
    }
  }
}
