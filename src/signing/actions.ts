/**
 * Store actions and how they map onto HTTP requests
 * @module signing/actions
 */

/**
 * HTTP methods used by the store API
 */
export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';

/**
 * Bucket addressing style.
 *
 * - `path`: `https://endpoint/bucket/key`
 * - `virtual-host`: `https://bucket.endpoint/key`
 */
export type UrlStyle = 'path' | 'virtual-host';

/**
 * Where a bucket lives
 */
export interface BucketTarget {
  readonly endpoint: URL;
  readonly region: string;
  readonly urlStyle: UrlStyle;
  readonly bucket: string;
}

/**
 * Every request the client knows how to sign
 */
export type StoreAction =
  | { readonly type: 'CreateBucket' }
  | { readonly type: 'DeleteBucket' }
  | { readonly type: 'PutObject'; readonly key: string }
  | { readonly type: 'GetObject'; readonly key: string }
  | { readonly type: 'DeleteObject'; readonly key: string }
  | {
      readonly type: 'ListObjectsV2';
      readonly prefix: string;
      readonly continuationToken?: string;
      readonly maxKeys?: number;
      readonly startAfter?: string;
    }
  | { readonly type: 'CreateMultipartUpload'; readonly key: string }
  | {
      readonly type: 'UploadPart';
      readonly key: string;
      readonly uploadId: string;
      readonly partNumber: number;
    }
  | { readonly type: 'CompleteMultipartUpload'; readonly key: string; readonly uploadId: string }
  | { readonly type: 'AbortMultipartUpload'; readonly key: string; readonly uploadId: string };

export type StoreActionType = StoreAction['type'];

/**
 * Unsigned form of an action: raw path and query pairs, nothing encoded yet.
 */
export interface ActionRequest {
  readonly method: HttpMethod;
  /**
   * `https:` or `http:`
   */
  readonly protocol: string;
  readonly host: string;
  readonly path: string;
  readonly query: Array<[string, string]>;
}

function basePath(endpoint: URL): string {
  return endpoint.pathname.replace(/\/+$/, '');
}

function resolveLocation(target: BucketTarget, key?: string): { host: string; path: string } {
  const base = basePath(target.endpoint);
  if (target.urlStyle === 'virtual-host') {
    return {
      host: `${target.bucket}.${target.endpoint.host}`,
      path: `${base}/${key ?? ''}`,
    };
  }
  return {
    host: target.endpoint.host,
    path: key === undefined ? `${base}/${target.bucket}` : `${base}/${target.bucket}/${key}`,
  };
}

function methodAndQuery(action: StoreAction): { method: HttpMethod; query: Array<[string, string]> } {
  switch (action.type) {
    case 'CreateBucket':
      return { method: 'PUT', query: [] };
    case 'DeleteBucket':
      return { method: 'DELETE', query: [] };
    case 'PutObject':
      return { method: 'PUT', query: [] };
    case 'GetObject':
      return { method: 'GET', query: [] };
    case 'DeleteObject':
      return { method: 'DELETE', query: [] };
    case 'ListObjectsV2': {
      const query: Array<[string, string]> = [
        ['list-type', '2'],
        ['prefix', action.prefix],
      ];
      if (action.continuationToken !== undefined) {
        query.push(['continuation-token', action.continuationToken]);
      }
      if (action.maxKeys !== undefined) {
        query.push(['max-keys', String(action.maxKeys)]);
      }
      if (action.startAfter !== undefined) {
        query.push(['start-after', action.startAfter]);
      }
      return { method: 'GET', query };
    }
    case 'CreateMultipartUpload':
      return { method: 'POST', query: [['uploads', '']] };
    case 'UploadPart':
      return {
        method: 'PUT',
        query: [
          ['partNumber', String(action.partNumber)],
          ['uploadId', action.uploadId],
        ],
      };
    case 'CompleteMultipartUpload':
      return { method: 'POST', query: [['uploadId', action.uploadId]] };
    case 'AbortMultipartUpload':
      return { method: 'DELETE', query: [['uploadId', action.uploadId]] };
  }
}

function actionKey(action: StoreAction): string | undefined {
  return 'key' in action ? action.key : undefined;
}

/**
 * Resolves an action against a bucket target.
 *
 * @example
 * ```typescript
 * resolveAction(
 *   { endpoint: new URL('http://localhost:9000'), region: 'us-east-1', urlStyle: 'path', bucket: 'photos' },
 *   { type: 'GetObject', key: 'cat.png' }
 * );
 * // { method: 'GET', protocol: 'http:', host: 'localhost:9000', path: '/photos/cat.png', query: [] }
 * ```
 */
export function resolveAction(target: BucketTarget, action: StoreAction): ActionRequest {
  const { method, query } = methodAndQuery(action);
  const { host, path } = resolveLocation(target, actionKey(action));
  return { method, protocol: target.endpoint.protocol, host, path, query };
}
