/**
 * Content type inference from object names.
 */

import mimeTypes from "./mime-types.json";

const TYPES: Readonly<Record<string, string>> = mimeTypes;

/**
 * Guess a content type from the extension of an object name.
 * Returns undefined when the name has no extension or the extension is unknown.
 */
export function guessContentType(objectName: string): string | undefined {
  const baseName = objectName.slice(objectName.lastIndexOf("/") + 1);
  const dot = baseName.lastIndexOf(".");
  if (dot <= 0 || dot === baseName.length - 1) {
    return undefined;
  }
  const ext = baseName.slice(dot + 1).toLowerCase();
  return Object.prototype.hasOwnProperty.call(TYPES, ext) ? TYPES[ext] : undefined;
}
