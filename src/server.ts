import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { JavadocLibrary } from './services/javadoc-library.js';
import { getClassInfo, listArchives, searchJavadoc } from './tools.js';

export function createServer(library: JavadocLibrary): McpServer {
  const server = new McpServer({
    name: "Javadoc Lookup",
    version: "1.0.0",
  });

  server.tool(
    "search_javadoc",
    "Find the fully-qualified names of Java classes by simple name (e.g. 'string') or fully-qualified name, ignoring case",
    {
      query: z.string().describe("The class name to search for"),
    },
    async (params) => searchJavadoc(library, params),
  );

  server.tool(
    "get_class_info",
    "Get the Javadoc information and documentation URL of a Java class",
    {
      class_name: z.string().describe("The fully-qualified class name, e.g. 'java.util.Map.Entry' (case-sensitive)"),
      frames: z.boolean().optional().describe("Return the URL of the framed version of the page"),
    },
    async (params) => getClassInfo(library, params),
  );

  server.tool(
    "list_archives",
    "List the loaded Javadoc archives",
    async () => listArchives(library),
  );

  return server;
}
