import type { ClassName } from './class-name.js';
import type { JavadocArchive } from '../services/javadoc-archive.js';

export interface ArchiveMetadata {
  /** Library name, e.g. "jsoup" */
  name?: string;
  version?: string;
  projectUrl?: string;
  /** Always ends with "/" when defined */
  baseUrl?: string;
  /** Template for building class URLs, see url-pattern.ts */
  javadocUrlPattern?: string;
}

export type ClassKind = 'class' | 'interface' | 'enum' | 'annotation';

export interface ClassInfo {
  name: ClassName;
  kind: ClassKind;
  modifiers: string[];
  description?: string;
  since?: string;
  deprecated: boolean;
  superClass?: string;
  interfaces: string[];
  constructors: JavaMethod[];
  methods: JavaMethod[];
  /** Non-framed documentation URL, if the archive defines one */
  documentationUrl?: string;
  /** The archive the class was loaded from */
  archive: JavadocArchive;
}

export interface JavaMethod {
  name: string;
  /** Undefined for constructors */
  returnType?: string;
  parameters: JavaParameter[];
  modifiers: string[];
  deprecated: boolean;
  description?: string;
}

export interface JavaParameter {
  name: string;
  type: string;
}
