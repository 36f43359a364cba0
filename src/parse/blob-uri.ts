import type { ParsedBlobUri, ParsedFileName } from '../azure/types.js';

const SCHEME_SEPARATOR = '://';

/**
 * Final '/'-separated segment of a path, or the whole path when it has none.
 */
function lastSegment(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? path : path.slice(idx + 1);
}

/**
 * Text after the last '.', or undefined when the name has no '.'.
 */
function extensionOf(fileName: string): string | undefined {
  const idx = fileName.lastIndexOf('.');
  return idx === -1 ? undefined : fileName.slice(idx + 1);
}

/**
 * Decompose a full blob URI into its structural parts.
 *
 * @param uri - e.g. "https://acme.blob.core.windows.net/logs/2024/run.csv?sv=2020-01-01"
 * @returns ParsedBlobUri. An object without keys when the input is not a blob URI.
 *
 * Checks, in order (any failure returns {}):
 *   1. The URI has a scheme separator "://"
 *   2. Everything from the first '?' onward is the SAS token
 *   3. The remainder contains '/' between authority and path
 *   4. The authority contains '.' and the path contains another '/'
 *
 * Given the example above:
 *   { account: "acme", container: "logs", blobPath: "2024/run.csv",
 *     fileName: "run.csv", fileExtension: "csv", sasToken: "?sv=2020-01-01" }
 */
export function parseBlobUri(uri: string): ParsedBlobUri {
  if (!uri) {
    return {};
  }

  const schemeIdx = uri.indexOf(SCHEME_SEPARATOR);
  if (schemeIdx === -1) {
    return {};
  }

  const afterScheme = uri.slice(schemeIdx + SCHEME_SEPARATOR.length);
  const queryIdx = afterScheme.indexOf('?');
  const path = queryIdx === -1 ? afterScheme : afterScheme.slice(0, queryIdx);
  const sasToken = queryIdx === -1 ? undefined : afterScheme.slice(queryIdx);

  const authorityEnd = path.indexOf('/');
  if (authorityEnd === -1) {
    return {};
  }

  const authority = path.slice(0, authorityEnd);
  const rawPath = path.slice(authorityEnd + 1);

  if (!authority.includes('.') || !rawPath.includes('/')) {
    return {};
  }

  const account = authority.slice(0, authority.indexOf('.'));
  const containerEnd = rawPath.indexOf('/');
  const container = rawPath.slice(0, containerEnd);
  const blobPath = rawPath.slice(containerEnd + 1);
  const fileName = lastSegment(blobPath);

  const result: ParsedBlobUri = {
    account,
    container,
    blobPath,
    fileName,
    fileExtension: extensionOf(fileName),
    sasToken,
  };
  return result;
}

/**
 * Split "directory/name.ext" into its directory, file name and extension.
 *
 * @returns {} when the path ends in '/' or is empty.
 */
export function parseFileName(filePath: string): ParsedFileName {
  const idx = filePath.lastIndexOf('/');
  const fileName = idx === -1 ? filePath : filePath.slice(idx + 1);

  if (fileName.length === 0) {
    return {};
  }

  return {
    directory: idx === -1 ? '' : filePath.slice(0, idx),
    fileName,
    fileExtension: extensionOf(fileName),
  };
}
