/**
 * Bookmarks Module
 * Loads the bookmark file into memory and runs one command against it
 */

import { CsvStorage } from './csv-storage.js';
import { DuplicateCodeError, StorageFormatError, UnknownCodeError } from './errors.js';
import type { Bookmark, BookmarkCollection, BrowserOpener, Settings } from './types.js';

export const EMPTY_MESSAGE = "\tIt's empty here!  :(  ";

export function formatBookmark(bookmark: Bookmark): string {
  return `[${bookmark.code}] ${bookmark.url} - ${bookmark.description}`;
}

function toRow(bookmark: Bookmark): string[] {
  return [bookmark.code, bookmark.url, bookmark.description];
}

export class BookmarksApp {
  private settings: Settings;
  private storage: CsvStorage;
  private browser: BrowserOpener;
  private bookmarks: BookmarkCollection = new Map();

  constructor(settings: Settings, browser: BrowserOpener) {
    this.settings = settings;
    this.browser = browser;
    this.storage = new CsvStorage(settings.storagePath);

    let record = 0;
    for (const row of this.storage.load()) {
      record++;
      if (row.length !== 3) {
        throw new StorageFormatError(this.storage.filename, record, row.length);
      }
      const [code, url, description] = row;
      this.bookmarks.set(code, { code, url, description });
    }
  }

  get size(): number {
    return this.bookmarks.size;
  }

  get(code: string): Bookmark | undefined {
    return this.bookmarks.get(code);
  }

  values(): Bookmark[] {
    return [...this.bookmarks.values()];
  }

  /**
   * Run the command named in the settings
   */
  async run(): Promise<void> {
    const { command, commandArgs, force } = this.settings;

    switch (command) {
      case 'list':
        this.list();
        return;
      case 'add': {
        const [code, url, description] = commandArgs;
        this.add(code, url, description, force);
        return;
      }
      case 'rm':
        this.rm(commandArgs[0]);
        return;
      case 'open':
        await this.open(commandArgs[0]);
        return;
    }
  }

  list(): void {
    if (this.bookmarks.size === 0) {
      console.log(EMPTY_MESSAGE);
      return;
    }

    for (const bookmark of this.bookmarks.values()) {
      console.log(formatBookmark(bookmark));
    }
  }

  /**
   * Insert a bookmark, or replace one in place when forced
   */
  add(code: string, url: string, description: string, force: boolean = false): void {
    const existing = this.bookmarks.get(code);
    if (existing && !force) {
      throw new DuplicateCodeError(code, formatBookmark(existing));
    }

    this.bookmarks.set(code, { code, url, description });
    this.save();
  }

  rm(code: string): void {
    if (!this.bookmarks.delete(code)) {
      throw new UnknownCodeError(code);
    }
    this.save();
  }

  async open(code: string): Promise<void> {
    const bookmark = this.bookmarks.get(code);
    if (!bookmark) {
      throw new UnknownCodeError(code);
    }
    await this.browser.open(bookmark.url);
  }

  private save(): void {
    this.storage.save([...this.bookmarks.values()].map(toRow));
  }
}
