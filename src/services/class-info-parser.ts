import type { ClassName } from '../models/class-name.js';
import type { ClassInfo, ClassKind, JavaMethod } from '../models/types.js';
import type { JavadocArchive } from './javadoc-archive.js';
import type { XmlNode } from './xml-node.js';

const kindKeywords = new Map<string, ClassKind>([
  ['class', 'class'],
  ['interface', 'interface'],
  ['enum', 'enum'],
  ['@interface', 'annotation'],
]);

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function splitModifiers(value: string): string[] {
  return value.split(/\s+/).filter(modifier => modifier.length > 0);
}

function parseMethod(element: XmlNode, constructor: boolean): JavaMethod {
  const method: JavaMethod = {
    name: element.attribute('name'),
    parameters: element.children('parameter').map(parameter => ({
      name: parameter.attribute('name'),
      type: parameter.attribute('type'),
    })),
    modifiers: splitModifiers(element.attribute('modifiers')),
    deprecated: element.attribute('deprecated') === 'true',
    description: optional(element.selectFirst('description')?.text() ?? ''),
  };
  if (!constructor) {
    method.returnType = optional(element.attribute('returns')) ?? 'void';
  }
  return method;
}

/**
 * Parse a class's XML record.
 * @param document the parsed XML document
 * @param name the class's name, as derived from its entry path
 * @param archive the archive the record was loaded from
 * @returns the class info or undefined if the document has no "class" root element
 */
export function parseClassInfo(document: XmlNode, name: ClassName, archive: JavadocArchive): ClassInfo | undefined {
  const classElement = document.selectFirst('/class');
  if (!classElement) {
    return undefined;
  }

  // e.g. "public final class"; the last keyword gives the kind
  let kind: ClassKind = 'class';
  const modifiers: string[] = [];
  for (const keyword of splitModifiers(classElement.attribute('modifiers'))) {
    const keywordKind = kindKeywords.get(keyword);
    if (keywordKind) {
      kind = keywordKind;
    } else {
      modifiers.push(keyword);
    }
  }

  const info: ClassInfo = {
    name,
    kind,
    modifiers,
    description: optional(classElement.selectFirst('description')?.text() ?? ''),
    since: optional(classElement.attribute('since')),
    deprecated: classElement.attribute('deprecated') === 'true',
    superClass: optional(classElement.attribute('superClass')),
    interfaces: classElement.children('interface')
      .map(element => element.attribute('name'))
      .filter(interfaceName => interfaceName.length > 0),
    constructors: classElement.children('constructor').map(element => ({
      ...parseMethod(element, true),
      name: name.simpleName,
    })),
    methods: classElement.children('method').map(element => parseMethod(element, false)),
    archive,
  };
  info.documentationUrl = archive.getUrl(info, false);

  return info;
}
