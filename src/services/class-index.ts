import type { ClassName } from '../models/class-name.js';

interface IndexedClass<T> {
  name: ClassName;
  source: T;
}

/**
 * Index of class names across several sources (archives). When the same
 * fully-qualified name is added by more than one source, the first one wins.
 */
export class ClassIndex<T> {
  private byFullName: Map<string, IndexedClass<T>> = new Map();
  private byLowerFullName: Map<string, IndexedClass<T>> = new Map();
  private bySimpleName: Map<string, IndexedClass<T>[]> = new Map();

  /**
   * Add a source's classes to the index
   */
  addClasses(source: T, names: Iterable<ClassName>): void {
    for (const name of names) {
      const fullName = name.fullyQualifiedName;
      if (this.byFullName.has(fullName)) {
        continue;
      }

      const entry = { name, source };
      this.byFullName.set(fullName, entry);

      const lowerFullName = fullName.toLowerCase();
      if (!this.byLowerFullName.has(lowerFullName)) {
        this.byLowerFullName.set(lowerFullName, entry);
      }

      const simpleKey = name.simpleName.toLowerCase();
      const bucket = this.bySimpleName.get(simpleKey) || [];
      bucket.push(entry);
      this.bySimpleName.set(simpleKey, bucket);
    }
  }

  clear(): void {
    this.byFullName.clear();
    this.byLowerFullName.clear();
    this.bySimpleName.clear();
  }

  /**
   * Search for classes. A query that matches a known fully-qualified name
   * (ignoring case) returns that class only; otherwise every class whose
   * simple name matches the query (ignoring case) is returned.
   */
  search(query: string): ClassName[] {
    const lowerQuery = query.trim().toLowerCase();
    if (lowerQuery === '') {
      return [];
    }

    const exact = this.byLowerFullName.get(lowerQuery);
    if (exact) {
      return [exact.name];
    }

    return (this.bySimpleName.get(lowerQuery) || []).map(entry => entry.name);
  }

  /**
   * Get the source that provides a class (case-sensitive)
   */
  getSource(fullName: string): T | undefined {
    return this.byFullName.get(fullName)?.source;
  }
}
