import JSZip from 'jszip';

/** One file placed in an archive */
export interface ArchiveEntry {
  /** Path inside the archive */
  name: string;
  data: Uint8Array;
}

/** Turns a set of files into one downloadable blob */
export interface Archiver {
  /** File extension of produced archives, without the dot */
  readonly extension: string;
  readonly contentType: string;
  archiveFiles(entries: ArchiveEntry[]): Promise<Uint8Array>;
}

/**
 * Deflate-compressed zip archives built in memory.
 */
export class ZipArchiver implements Archiver {
  readonly extension = 'zip';
  readonly contentType = 'application/zip';

  async archiveFiles(entries: ArchiveEntry[]): Promise<Uint8Array> {
    const zip = new JSZip();
    for (const entry of entries) {
      zip.file(entry.name, entry.data);
    }
    return zip.generateAsync({
      type: 'uint8array',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }
}
