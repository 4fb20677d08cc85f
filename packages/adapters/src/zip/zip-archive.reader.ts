import JSZip from 'jszip';
import { ParseError } from '@simval/domain';
import type { ArchiveEntry, ArchiveReaderPort } from '@simval/domain';

export class JsZipArchiveReader implements ArchiveReaderPort {
  async open(bytes: Buffer): Promise<ArchiveEntry[]> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (err) {
      throw new ParseError(
        `Cannot open ZIP: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const entries: ArchiveEntry[] = [];
    zip.forEach((path, file) => {
      if (file.dir) return;
      entries.push({ path, read: () => file.async('nodebuffer') });
    });
    return entries;
  }
}
