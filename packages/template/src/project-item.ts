import type { ProjectItem } from "./types.js";

export const DEFAULT_WORKING_DIRECTORY = "/playbench/";

const encoder = new TextEncoder();

/**
 * Wrap one template file for the engine.
 *
 * Carriage returns are dropped and leading whitespace trimmed before encoding, so the
 * engine only ever sees `\n` line endings.
 */
export function createProjectItem(
  fileName: string,
  fileContent: string,
  workingDirectory: string = DEFAULT_WORKING_DIRECTORY,
): ProjectItem {
  const physicalPath = workingDirectory + fileName;

  // Virtual paths are always of the form '/a/b/c.view'
  const filePath = fileName.startsWith("/") ? fileName : `/${fileName}`;

  let content = fileContent;
  if (content.includes("\r")) {
    content = content.replace(/\r/g, "");
  }

  return {
    basePath: workingDirectory,
    filePath,
    physicalPath,
    fileName,
    content: encoder.encode(content.trimStart()),
  };
}
