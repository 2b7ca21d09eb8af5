import { promises as fs } from 'fs';
import JSZip from 'jszip';
import { ArchiveReadError, errorMessage } from '../errors.js';

/**
 * Read-only view of the files inside an archive. Paths are absolute within
 * the archive and use "/" as the separator, e.g. "/java/util/Map.xml".
 */
export interface ArchiveTree {
  /**
   * Every file entry in the archive, including those in nested directories.
   */
  list(): string[];

  exists(path: string): boolean;

  /**
   * @returns the entry's content or undefined if there is no such entry
   */
  read(path: string): Promise<string | undefined>;
}

function toZipPath(path: string): string {
  return path.replace(/^\/+/, '');
}

export class ZipArchiveTree implements ArchiveTree {
  constructor(private readonly zip: JSZip, private readonly file: string) {}

  list(): string[] {
    const paths: string[] = [];
    this.zip.forEach((relativePath, file) => {
      if (!file.dir) {
        paths.push(`/${relativePath}`);
      }
    });
    return paths;
  }

  exists(path: string): boolean {
    const file = this.zip.file(toZipPath(path));
    return file !== null && !file.dir;
  }

  async read(path: string): Promise<string | undefined> {
    const file = this.zip.file(toZipPath(path));
    if (!file || file.dir) {
      return undefined;
    }
    try {
      return await file.async('string');
    } catch (err) {
      throw new ArchiveReadError(`Could not read ${path} from ${this.file}: ${errorMessage(err)}`, this.file, { cause: err });
    }
  }
}

/**
 * Read a ZIP file from disk and open it as an archive tree. The tree holds
 * no file handles; it is dropped once the caller is done with it.
 * @throws ArchiveReadError if the file cannot be read or is not a ZIP file
 */
export async function openArchiveTree(file: string): Promise<ArchiveTree> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(file);
  } catch (err) {
    throw new ArchiveReadError(`Could not read archive ${file}: ${errorMessage(err)}`, file, { cause: err });
  }

  try {
    const zip = await JSZip.loadAsync(buffer);
    return new ZipArchiveTree(zip, file);
  } catch (err) {
    throw new ArchiveReadError(`Could not open archive ${file}: ${errorMessage(err)}`, file, { cause: err });
  }
}
