export type JavadocErrorKind = 'io' | 'malformed-metadata' | 'malformed-record';

/**
 * Base class for failures raised while reading Javadoc archives. A class that
 * cannot be found is not an error; lookups return undefined instead.
 */
export abstract class JavadocError extends Error {
  abstract readonly kind: JavadocErrorKind;

  constructor(message: string, readonly archivePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The archive file could not be read or is not a valid ZIP file.
 */
export class ArchiveReadError extends JavadocError {
  readonly kind = 'io';
}

/**
 * The archive's info.xml entry exists but is not well-formed XML.
 */
export class MalformedMetadataError extends JavadocError {
  readonly kind = 'malformed-metadata';
}

/**
 * A class's entry exists but its XML cannot be parsed into class info.
 */
export class MalformedClassRecordError extends JavadocError {
  readonly kind = 'malformed-record';

  constructor(message: string, archivePath: string, readonly entryPath: string, options?: { cause?: unknown }) {
    super(message, archivePath, options);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
