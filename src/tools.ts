import type { ClassInfo } from './models/types.js';
import { errorMessage } from './errors.js';
import * as logger from './logger.js';
import type { JavadocArchive } from './services/javadoc-archive.js';
import type { JavadocLibrary } from './services/javadoc-library.js';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(action: string, err: unknown): ToolResult {
  logger.error(`${action}: ${errorMessage(err)}`);
  return { ...textResult(`Error ${action}: ${errorMessage(err)}`), isError: true };
}

function describeArchive(archive: JavadocArchive) {
  return {
    name: archive.name,
    version: archive.version,
    projectUrl: archive.projectUrl,
    baseUrl: archive.baseUrl,
    path: archive.path,
  };
}

function describeClass(info: ClassInfo, url: string | undefined) {
  return {
    name: info.name.fullyQualifiedName,
    packageName: info.name.packageName,
    simpleName: info.name.simpleName,
    kind: info.kind,
    modifiers: info.modifiers,
    deprecated: info.deprecated,
    since: info.since,
    superClass: info.superClass,
    interfaces: info.interfaces,
    description: info.description,
    url,
    constructors: info.constructors,
    methods: info.methods,
    library: describeArchive(info.archive),
  };
}

export function searchJavadoc(library: JavadocLibrary, params: { query: string }): ToolResult {
  try {
    const results = library.search(params.query);
    if (results.length === 0) {
      return textResult(`No classes found matching query: ${params.query}`);
    }
    return jsonResult(results);
  } catch (err) {
    return errorResult('searching classes', err);
  }
}

export async function getClassInfo(
  library: JavadocLibrary,
  params: { class_name: string; frames?: boolean },
): Promise<ToolResult> {
  try {
    const info = await library.getClassInfo(params.class_name);
    if (!info) {
      return textResult(`Class not found: ${params.class_name}`);
    }
    const url = library.getUrl(info, params.frames ?? false);
    return jsonResult(describeClass(info, url));
  } catch (err) {
    return errorResult('retrieving class info', err);
  }
}

export function listArchives(library: JavadocLibrary): ToolResult {
  return jsonResult(library.getArchives().map(describeArchive));
}
