/**
 * XML parsing and building for S3-compatible payloads
 *
 * @module xml
 */

export {
  parseXml,
  buildXml,
  createXmlParser,
  createXmlBuilder,
  isXmlElement,
  childElement,
  childElements,
  childText,
  childValue,
  cleanETag,
  parseIntSafe,
  parseDateSafe,
} from './parser.js';
export type { XmlNode, XmlElement } from './parser.js';

export { parseErrorDocument, isErrorDocument } from './error.js';
export type { ParsedErrorDocument } from './error.js';

export { parseListObjectsResponse } from './list-objects.js';
export type { ObjectEntry, ListingPage } from './list-objects.js';

export {
  parseInitiateMultipartResponse,
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseCompleteMultipartRequest,
} from './multipart.js';
export type { CompletedPart } from './multipart.js';
