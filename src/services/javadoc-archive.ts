import { promises as fs } from 'fs';
import { ClassName, JAVADOC_EXTENSION } from '../models/class-name.js';
import type { ArchiveMetadata, ClassInfo } from '../models/types.js';
import { ArchiveReadError, MalformedClassRecordError, MalformedMetadataError, errorMessage } from '../errors.js';
import { type ArchiveTree, openArchiveTree } from './archive-tree.js';
import { parseClassInfo } from './class-info-parser.js';
import { applyUrlPattern } from './url-pattern.js';
import { XmlNode } from './xml-node.js';

const INFO_ENTRY = `/info${JAVADOC_EXTENSION}`;

type TreeOpener = (file: string) => Promise<ArchiveTree>;

/**
 * A ZIP file containing Javadoc information for a library. Class records
 * live at "/<package path>/<Outer>.<Simple>.xml" and the optional library
 * metadata at "/info.xml".
 *
 * Instances are immutable and hold no open handles: every operation reads
 * the ZIP file again.
 */
export class JavadocArchive {
  private constructor(
    /** Canonical (symlink-resolved) path to the ZIP file */
    readonly path: string,
    readonly metadata: Readonly<ArchiveMetadata>,
    private readonly openTree: TreeOpener,
  ) {}

  /**
   * Open an archive and read its metadata.
   * @throws ArchiveReadError if the file cannot be read
   * @throws MalformedMetadataError if info.xml is not well-formed
   */
  static async open(file: string, openTree: TreeOpener = openArchiveTree): Promise<JavadocArchive> {
    let realPath: string;
    try {
      realPath = await fs.realpath(file);
    } catch (err) {
      throw new ArchiveReadError(`Could not resolve archive path ${file}: ${errorMessage(err)}`, file, { cause: err });
    }

    const tree = await openTree(realPath);
    const metadata = await JavadocArchive.readMetadata(tree, realPath);
    return new JavadocArchive(realPath, Object.freeze(metadata), openTree);
  }

  /**
   * Read the library metadata from info.xml. A missing entry or a missing
   * "info" element is not an error; all fields are left undefined.
   */
  private static async readMetadata(tree: ArchiveTree, archivePath: string): Promise<ArchiveMetadata> {
    const xml = await tree.read(INFO_ENTRY);
    if (xml === undefined) {
      return {};
    }

    let document: XmlNode;
    try {
      document = await XmlNode.parse(xml);
    } catch (err) {
      throw new MalformedMetadataError(`Could not parse ${INFO_ENTRY} in ${archivePath}: ${errorMessage(err)}`, archivePath, { cause: err });
    }

    const infoElement = document.selectFirst('/info');
    if (!infoElement) {
      return {};
    }

    const attribute = (name: string): string | undefined => {
      const value = infoElement.attribute(name);
      return value === '' ? undefined : value;
    };

    // make sure the base URL ends with a "/"
    let baseUrl = attribute('baseUrl');
    if (baseUrl !== undefined && !baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    return {
      name: attribute('name'),
      version: attribute('version'),
      projectUrl: attribute('projectUrl'),
      baseUrl,
      javadocUrlPattern: attribute('javadocUrlPattern'),
    };
  }

  get name(): string | undefined {
    return this.metadata.name;
  }

  get version(): string | undefined {
    return this.metadata.version;
  }

  get projectUrl(): string | undefined {
    return this.metadata.projectUrl;
  }

  get baseUrl(): string | undefined {
    return this.metadata.baseUrl;
  }

  /**
   * Get all classes in the library.
   * @returns the class names, in no particular order
   */
  async getClassNames(): Promise<ClassName[]> {
    const tree = await this.openTree(this.path);
    return tree.list()
      .filter(entry => entry.endsWith(JAVADOC_EXTENSION) && entry !== INFO_ENTRY)
      .map(entry => ClassName.fromEntryPath(entry));
  }

  /**
   * Get information about a class.
   * @param fullName the fully-qualified class name, e.g. "java.lang.String" (case-sensitive)
   * @returns the class info or undefined if the class is not in this archive
   * @throws ArchiveReadError if the archive cannot be read
   * @throws MalformedClassRecordError if the class's XML cannot be parsed
   */
  async getClassInfo(fullName: string): Promise<ClassInfo | undefined> {
    const tree = await this.openTree(this.path);
    const entry = JavadocArchive.findClassEntry(tree, fullName);
    if (entry === undefined) {
      return undefined;
    }

    const xml = await tree.read(entry);
    if (xml === undefined) {
      return undefined;
    }

    let document: XmlNode;
    try {
      document = await XmlNode.parse(xml);
    } catch (err) {
      throw new MalformedClassRecordError(`Could not parse ${entry} in ${this.path}: ${errorMessage(err)}`, this.path, entry, { cause: err });
    }

    const info = parseClassInfo(document, ClassName.fromEntryPath(entry), this);
    if (!info) {
      throw new MalformedClassRecordError(`${entry} in ${this.path} has no <class> element`, this.path, entry);
    }
    return info;
  }

  /**
   * Find the entry for a class. Tries the most-nested package first:
   * "java.util.Map.Entry" checks "/java/util/Map/Entry.xml", then
   * "/java/util/Map.Entry.xml", then "/java/util.Map.Entry.xml", and so on.
   * @returns the entry path or undefined if none exists
   */
  static findClassEntry(tree: ArchiveTree, fullName: string): string | undefined {
    const split = fullName.split('.');
    if (split.some(segment => segment === '')) {
      return undefined;
    }

    for (let i = split.length; i > 0; i--) {
      const directories = split.slice(0, i).map(segment => `/${segment}`).join('');
      const nested = split.slice(i).map(segment => `.${segment}`).join('');
      const path = `${directories}${nested}${JAVADOC_EXTENSION}`;

      if (path !== INFO_ENTRY && tree.exists(path)) {
        return path;
      }
    }

    return undefined;
  }

  /**
   * Get the URL of a class's Javadoc page.
   * @param frames true for the framed version of the page
   * @returns the URL or undefined if this archive defines neither a base URL nor a URL pattern
   */
  getUrl(info: Pick<ClassInfo, 'name'>, frames: boolean): string | undefined {
    const { baseUrl, javadocUrlPattern } = this.metadata;
    if (javadocUrlPattern !== undefined) {
      return applyUrlPattern(javadocUrlPattern, { baseUrl, className: info.name });
    }

    if (baseUrl === undefined) {
      return undefined;
    }

    const className = info.name;
    let url = baseUrl;
    if (frames) {
      url += 'index.html?';
    }
    if (className.packageName) {
      url += `${className.packageName.replace(/\./g, '/')}/`;
    }
    for (const outerClass of className.outerClassNames) {
      url += `${outerClass}.`;
    }
    return `${url}${className.simpleName}.html`;
  }

  equals(other: JavadocArchive): boolean {
    return this.path === other.path;
  }

  toString(): string {
    const label = [this.name, this.version].filter(part => part !== undefined).join(' ');
    return label === '' ? this.path : `${label} (${this.path})`;
  }
}
