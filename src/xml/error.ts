/**
 * XML parsing for S3 error responses
 * @module xml/error
 */

import { parseXml, childElement, childText, childValue } from './parser.js';

/**
 * Parsed `<Error>` document. Field names on the wire are case-sensitive:
 * `Code`, `Message`, `BucketName`, `Resource`, `RequestId`, `HostId`.
 */
export interface ParsedErrorDocument {
  /**
   * Raw code text; empty when the document has no `Code` element
   */
  readonly code: string;
  readonly message: string;
  readonly bucketName?: string;
  readonly resource?: string;
  readonly requestId?: string;
  readonly hostId?: string;
}

/**
 * Parses an S3 error document.
 *
 * @throws Error if the body is not XML or its root is not `<Error>`
 *
 * @example
 * ```typescript
 * const error = parseErrorDocument(`
 *   <Error>
 *     <Code>NoSuchKey</Code>
 *     <Message>The specified key does not exist.</Message>
 *     <Resource>/photos/cat.png</Resource>
 *     <RequestId>4442587FB7D0A2F9</RequestId>
 *   </Error>
 * `);
 * error.code; // 'NoSuchKey'
 * ```
 */
export function parseErrorDocument(xml: string): ParsedErrorDocument {
  const parsed = parseXml(xml);
  const error = childElement(parsed, 'Error');

  if (!error) {
    if (childText(parsed, 'Error') !== undefined) {
      return { code: '', message: '' };
    }
    throw new Error('missing Error element');
  }

  return {
    code: childValue(error, 'Code') ?? '',
    message: childValue(error, 'Message') ?? '',
    bucketName: childValue(error, 'BucketName'),
    resource: childValue(error, 'Resource'),
    requestId: childValue(error, 'RequestId'),
    hostId: childValue(error, 'HostId'),
  };
}

/**
 * Quick check for an `<Error>` document, used on 200 responses of
 * CompleteMultipartUpload where the store may report a late failure.
 */
export function isErrorDocument(xml: string): boolean {
  if (!xml.includes('<Error>')) {
    return false;
  }
  try {
    parseErrorDocument(xml);
    return true;
  } catch {
    return false;
  }
}
