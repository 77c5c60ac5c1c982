/**
 * Tests for multipart XML
 */

import { describe, it, expect } from 'vitest';
import {
  buildCompleteMultipartXml,
  parseCompleteMultipartRequest,
  parseCompleteMultipartResponse,
  parseInitiateMultipartResponse,
} from '../multipart.js';

describe('parseInitiateMultipartResponse', () => {
  it('extracts the upload id', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
      <InitiateMultipartUploadResult>
        <Bucket>photos</Bucket>
        <Key>big.bin</Key>
        <UploadId>upload-7</UploadId>
      </InitiateMultipartUploadResult>`;

    expect(parseInitiateMultipartResponse(xml)).toBe('upload-7');
  });

  it('rejects a response without UploadId', () => {
    expect(() =>
      parseInitiateMultipartResponse('<InitiateMultipartUploadResult><Key>k</Key></InitiateMultipartUploadResult>')
    ).toThrow('missing UploadId element');
  });

  it('rejects a body that is not XML', () => {
    expect(() => parseInitiateMultipartResponse('not xml')).toThrow(/^Malformed XML/);
  });
});

describe('buildCompleteMultipartXml', () => {
  it('lists parts in the given order', () => {
    const xml = buildCompleteMultipartXml([
      { partNumber: 1, eTag: 'a1' },
      { partNumber: 2, eTag: 'b2' },
    ]);

    expect(xml).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><CompleteMultipartUpload>' +
        '<Part><PartNumber>1</PartNumber><ETag>a1</ETag></Part>' +
        '<Part><PartNumber>2</PartNumber><ETag>b2</ETag></Part>' +
        '</CompleteMultipartUpload>'
    );
  });

  it('reads back what it writes', () => {
    const parts = [
      { partNumber: 1, eTag: 'a1' },
      { partNumber: 2, eTag: 'b2' },
      { partNumber: 3, eTag: 'c3' },
    ];

    expect(parseCompleteMultipartRequest(buildCompleteMultipartXml(parts))).toEqual(parts);
  });
});

describe('parseCompleteMultipartResponse', () => {
  it('strips quotes from the ETag', () => {
    const result = parseCompleteMultipartResponse(
      '<CompleteMultipartUploadResult><Location>http://store.test/photos/big.bin</Location><ETag>"abc-2"</ETag></CompleteMultipartUploadResult>'
    );

    expect(result).toEqual({ location: 'http://store.test/photos/big.bin', eTag: 'abc-2' });
  });

  it('accepts an empty body', () => {
    expect(parseCompleteMultipartResponse('')).toEqual({});
  });
});
