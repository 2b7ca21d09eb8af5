export const JAVADOC_EXTENSION = '.xml';

/**
 * A fully- or partially-qualified Java class name, e.g. "java.util.Map.Entry"
 * (package "java.util", outer class "Map", simple name "Entry").
 */
export class ClassName {
  readonly packageName?: string;
  readonly outerClassNames: readonly string[];
  readonly simpleName: string;
  readonly fullyQualifiedName: string;

  constructor(packageName: string | undefined, outerClassNames: readonly string[], simpleName: string) {
    this.packageName = packageName === '' ? undefined : packageName;
    this.outerClassNames = Object.freeze([...outerClassNames]);
    this.simpleName = simpleName;

    const parts: string[] = [];
    if (this.packageName) parts.push(this.packageName);
    parts.push(...this.outerClassNames, simpleName);
    this.fullyQualifiedName = parts.join('.');
  }

  /**
   * Parse a dotted class name. Leading segments are treated as the package
   * until the first segment that starts with an uppercase letter; that
   * segment and the ones after it (except the last) are outer classes.
   */
  static parse(fullyQualifiedName: string): ClassName {
    const segments = fullyQualifiedName.split('.');
    const simpleName = segments.pop() ?? '';

    let firstClass = segments.findIndex(segment => /^[A-Z]/.test(segment));
    if (firstClass < 0) {
      firstClass = segments.length;
    }

    const packageName = segments.slice(0, firstClass).join('.');
    const outerClassNames = segments.slice(firstClass);
    return new ClassName(packageName, outerClassNames, simpleName);
  }

  /**
   * Convert an archive entry path (e.g. "/java/util/Map.Entry.xml") to a class name.
   */
  static fromEntryPath(entryPath: string): ClassName {
    const path = entryPath.replace(/^\/+/, '');
    const slash = path.lastIndexOf('/');

    // no directory means the default package
    const packageName = slash < 0 ? undefined : path.slice(0, slash).replace(/\//g, '.');

    let fileName = slash < 0 ? path : path.slice(slash + 1);
    if (fileName.endsWith(JAVADOC_EXTENSION)) {
      fileName = fileName.slice(0, -JAVADOC_EXTENSION.length);
    }

    const split = fileName.split('.');
    const simpleName = split[split.length - 1];
    return new ClassName(packageName, split.slice(0, -1), simpleName);
  }

  /**
   * The path of this class's entry inside a Javadoc archive.
   */
  toEntryPath(): string {
    const directory = this.packageName ? `/${this.packageName.replace(/\./g, '/')}` : '';
    const fileName = [...this.outerClassNames, this.simpleName].join('.');
    return `${directory}/${fileName}${JAVADOC_EXTENSION}`;
  }

  equals(other: ClassName): boolean {
    return this.fullyQualifiedName === other.fullyQualifiedName;
  }

  toString(): string {
    return this.fullyQualifiedName;
  }
}
