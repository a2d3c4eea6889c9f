// Journal repository port - day files inside the journal directory

export interface JournalRepository {
  /**
   * Path of the day file for `date`. An existing file wins; a new file
   * follows the extension convention of the directory.
   */
  resolvePath(date: Date): Promise<string>;

  /** File content, or null when the file does not exist. */
  read(path: string): Promise<string | null>;

  /** Back up the current file (if any), then write `content`. */
  write(path: string, content: string): Promise<void>;

  /** `YYYYMMDD` stem of a day file path */
  fileDateOf(path: string): string;
}
