export interface ArchiveEntry {
  /** Path inside the archive, `/`-separated. */
  readonly path: string;
  read(): Promise<Buffer>;
}

export interface ArchiveReaderPort {
  /** File entries only; fails with ParseError when the archive cannot be opened. */
  open(bytes: Buffer): Promise<ArchiveEntry[]>;
}
