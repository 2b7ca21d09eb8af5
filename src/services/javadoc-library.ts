import { promises as fs } from 'fs';
import path from 'path';
import type { ClassName } from '../models/class-name.js';
import type { ClassInfo } from '../models/types.js';
import { errorMessage } from '../errors.js';
import * as logger from '../logger.js';
import { ClassIndex } from './class-index.js';
import { JavadocArchive } from './javadoc-archive.js';

/**
 * The set of loaded Javadoc archives and the index of the classes they
 * contain. This is the lookup API used by the MCP tools.
 */
export class JavadocLibrary {
  private archives: JavadocArchive[] = [];
  private classNames: Map<JavadocArchive, ClassName[]> = new Map();
  private index = new ClassIndex<JavadocArchive>();

  /**
   * Load an archive and index its classes. Loading the same file twice
   * (including through a symlink) has no effect.
   * @returns the loaded archive
   */
  async addArchive(file: string): Promise<JavadocArchive> {
    const archive = await JavadocArchive.open(file);
    const loaded = this.findLoaded(archive);
    if (loaded) {
      return loaded;
    }

    const names = await archive.getClassNames();

    // another call may have loaded the same file while this one was reading
    const loadedMeanwhile = this.findLoaded(archive);
    if (loadedMeanwhile) {
      return loadedMeanwhile;
    }

    this.index.addClasses(archive, names);
    this.classNames.set(archive, names);
    this.archives.push(archive);

    logger.info(`Loaded ${archive} with ${names.length} classes`);
    return archive;
  }

  /**
   * Unload an archive.
   * @returns true if the archive was loaded
   */
  async removeArchive(file: string): Promise<boolean> {
    const realPath = await fs.realpath(file).catch(() => path.resolve(file));
    const archive = this.archives.find(loaded => loaded.path === realPath);
    if (!archive) {
      return false;
    }

    this.archives = this.archives.filter(loaded => loaded !== archive);
    this.classNames.delete(archive);

    // rebuild from the names read at load time; classes hidden by the removed archive reappear
    this.index.clear();
    for (const loaded of this.archives) {
      this.index.addClasses(loaded, this.classNames.get(loaded) ?? []);
    }

    logger.info(`Unloaded ${archive}`);
    return true;
  }

  /**
   * Load every ZIP file in a directory, in file name order.
   * @returns the archives that were loaded
   */
  async loadDirectory(directory: string): Promise<JavadocArchive[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const zipFiles = entries
      .filter(entry => !entry.isDirectory() && entry.name.toLowerCase().endsWith('.zip'))
      .map(entry => entry.name)
      .sort();

    const loaded: JavadocArchive[] = [];
    for (const fileName of zipFiles) {
      const file = path.join(directory, fileName);
      try {
        loaded.push(await this.addArchive(file));
      } catch (err) {
        logger.error(`Failed to load archive ${file}: ${errorMessage(err)}`);
        throw err;
      }
    }
    return loaded;
  }

  private findLoaded(archive: JavadocArchive): JavadocArchive | undefined {
    const existing = this.archives.find(loaded => loaded.equals(archive));
    if (existing) {
      logger.debug(`Archive already loaded: ${archive.path}`);
    }
    return existing;
  }

  getArchives(): readonly JavadocArchive[] {
    return this.archives;
  }

  /**
   * Search for the fully-qualified name of a class.
   * @param query a simple class name (e.g. "string") or a fully-qualified
   * class name (e.g. "java.lang.String"); case does not matter
   * @returns the matching fully-qualified names, empty if none were found
   */
  search(query: string): string[] {
    return this.index.search(query).map(name => name.fullyQualifiedName);
  }

  /**
   * Get the Javadoc info on a class.
   * @param fullyQualifiedClassName e.g. "java.lang.String" (case-sensitive)
   * @returns the class info or undefined if the class was not found
   * @throws JavadocError if the archive cannot be read or the class record is malformed
   */
  async getClassInfo(fullyQualifiedClassName: string): Promise<ClassInfo | undefined> {
    const archive = this.index.getSource(fullyQualifiedClassName);
    if (!archive) {
      return undefined;
    }
    return archive.getClassInfo(fullyQualifiedClassName);
  }

  /**
   * Get the URL of a class's Javadoc page.
   */
  getUrl(info: ClassInfo, frames: boolean): string | undefined {
    return info.archive.getUrl(info, frames);
  }
}
