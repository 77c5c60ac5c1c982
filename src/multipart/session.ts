/**
 * State of one multipart upload
 * @module multipart/session
 */

import { InternalError, MAX_PART_NUMBER, UserError } from '../errors/categories.js';
import type { CompletedPart } from '../xml/multipart.js';

/**
 * `uploading` until the upload reaches one of the terminal states.
 */
export type MultipartSessionState = 'uploading' | 'completed' | 'aborted' | 'failed';

/**
 * Tracks part numbering and the ETags of finished parts. Part numbers are
 * handed out strictly in sequence from 1; part completions may arrive in any
 * order.
 */
export class MultipartSession {
  private nextPartNumber = 1;
  private readonly eTags = new Map<number, string>();
  private uploadedBytes = 0;
  private currentState: MultipartSessionState = 'uploading';

  constructor(
    readonly key: string,
    readonly uploadId: string
  ) {}

  get state(): MultipartSessionState {
    return this.currentState;
  }

  /**
   * Part numbers handed out so far
   */
  get partsAssigned(): number {
    return this.nextPartNumber - 1;
  }

  get bytesUploaded(): number {
    return this.uploadedBytes;
  }

  /**
   * Takes the next part number.
   *
   * @throws {UserError} when the upload already holds the maximum number of parts
   */
  assignPartNumber(): number {
    this.ensureUploading();
    if (this.nextPartNumber > MAX_PART_NUMBER) {
      throw UserError.tooManyParts(this.key, this.uploadId);
    }
    return this.nextPartNumber++;
  }

  recordPart(part: CompletedPart, size: number): void {
    this.ensureUploading();
    this.eTags.set(part.partNumber, part.eTag);
    this.uploadedBytes += size;
  }

  /**
   * Finished parts in ascending part-number order
   */
  completedParts(): CompletedPart[] {
    return [...this.eTags.entries()]
      .sort(([a], [b]) => a - b)
      .map(([partNumber, eTag]) => ({ partNumber, eTag }));
  }

  markCompleted(): void {
    this.ensureUploading();
    this.currentState = 'completed';
  }

  markFailed(): void {
    if (this.currentState === 'uploading') {
      this.currentState = 'failed';
    }
  }

  markAborted(): void {
    if (this.currentState === 'uploading' || this.currentState === 'failed') {
      this.currentState = 'aborted';
    }
  }

  private ensureUploading(): void {
    if (this.currentState !== 'uploading') {
      throw new InternalError({
        message: `Multipart session for "${this.key}" is ${this.currentState}`,
        code: 'SessionClosed',
        details: { key: this.key, uploadId: this.uploadId },
      });
    }
  }
}
