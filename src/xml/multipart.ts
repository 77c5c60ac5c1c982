/**
 * XML for multipart upload operations
 * @module xml/multipart
 */

import { buildXml, childElement, childElements, childText, childValue, cleanETag, parseXml } from './parser.js';

/**
 * A part recorded for completion
 */
export interface CompletedPart {
  readonly partNumber: number;
  /**
   * ETag without surrounding quotes
   */
  readonly eTag: string;
}

/**
 * Extracts the upload id from an `<InitiateMultipartUploadResult>` document.
 *
 * @throws Error if the document is malformed or has no UploadId
 */
export function parseInitiateMultipartResponse(xml: string): string {
  const parsed = parseXml(xml);
  const result = childElement(parsed, 'InitiateMultipartUploadResult');
  if (!result) {
    throw new Error('missing InitiateMultipartUploadResult element');
  }

  const uploadId = childValue(result, 'UploadId');
  if (!uploadId) {
    throw new Error('missing UploadId element');
  }
  return uploadId;
}

/**
 * Builds the CompleteMultipartUpload request body. Parts are written in the
 * order given; callers pass them sorted by part number.
 *
 * @example
 * ```typescript
 * buildCompleteMultipartXml([{ partNumber: 1, eTag: 'a1' }]);
 * // '<?xml version="1.0" encoding="UTF-8"?><CompleteMultipartUpload><Part><PartNumber>1</PartNumber><ETag>a1</ETag></Part></CompleteMultipartUpload>'
 * ```
 */
export function buildCompleteMultipartXml(parts: readonly CompletedPart[]): string {
  return buildXml({
    CompleteMultipartUpload: {
      Part: parts.map((part) => ({
        PartNumber: String(part.partNumber),
        ETag: part.eTag,
      })),
    },
  });
}

/**
 * Parses a `<CompleteMultipartUploadResult>` document. The store may omit
 * fields, so everything is optional.
 */
export function parseCompleteMultipartResponse(xml: string): { location?: string; eTag?: string } {
  if (xml.trim() === '') {
    return {};
  }
  const parsed = parseXml(xml);
  const result = childElement(parsed, 'CompleteMultipartUploadResult');
  if (!result) {
    throw new Error('missing CompleteMultipartUploadResult element');
  }
  const eTag = childValue(result, 'ETag');
  return {
    location: childValue(result, 'Location'),
    eTag: eTag === undefined ? undefined : cleanETag(eTag),
  };
}

/**
 * Parses the body the client sends to complete an upload. Used by the
 * in-memory store.
 *
 * @throws Error if the document is malformed
 */
export function parseCompleteMultipartRequest(xml: string): CompletedPart[] {
  const parsed = parseXml(xml);
  const root = childElement(parsed, 'CompleteMultipartUpload');
  if (!root) {
    if (childText(parsed, 'CompleteMultipartUpload') !== undefined) {
      return [];
    }
    throw new Error('missing CompleteMultipartUpload element');
  }
  return childElements(root, 'Part').map((item, index) => {
    const partNumber = Number.parseInt(childValue(item, 'PartNumber') ?? '', 10);
    const eTag = childValue(item, 'ETag');
    if (Number.isNaN(partNumber) || eTag === undefined) {
      throw new Error(`Part element ${index} is missing PartNumber or ETag`);
    }
    return { partNumber, eTag: cleanETag(eTag) };
  });
}
