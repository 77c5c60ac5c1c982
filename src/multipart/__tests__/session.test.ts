import { describe, it, expect } from 'vitest';
import { InternalError, UserError } from '../../errors/categories.js';
import { MultipartSession } from '../session.js';

describe('MultipartSession', () => {
  it('hands out part numbers in sequence', () => {
    const session = new MultipartSession('big', 'u1');

    expect(session.assignPartNumber()).toBe(1);
    expect(session.assignPartNumber()).toBe(2);
    expect(session.partsAssigned).toBe(2);
  });

  it('lists completed parts by part number', () => {
    const session = new MultipartSession('big', 'u1');
    session.recordPart({ partNumber: 3, eTag: 'c' }, 4);
    session.recordPart({ partNumber: 1, eTag: 'a' }, 5);
    session.recordPart({ partNumber: 2, eTag: 'b' }, 5);

    expect(session.completedParts()).toEqual([
      { partNumber: 1, eTag: 'a' },
      { partNumber: 2, eTag: 'b' },
      { partNumber: 3, eTag: 'c' },
    ]);
    expect(session.bytesUploaded).toBe(14);
  });

  it('stops at 10000 parts', () => {
    const session = new MultipartSession('big', 'u1');
    for (let i = 0; i < 10000; i++) {
      session.assignPartNumber();
    }

    expect(() => session.assignPartNumber()).toThrow(UserError);
    expect(session.partsAssigned).toBe(10000);
  });

  it('refuses changes once closed', () => {
    const session = new MultipartSession('big', 'u1');
    session.markCompleted();

    expect(session.state).toBe('completed');
    expect(() => session.assignPartNumber()).toThrow(InternalError);
    expect(() => session.recordPart({ partNumber: 1, eTag: 'a' }, 1)).toThrow(
      'Multipart session for "big" is completed'
    );
  });

  it('moves from failed to aborted', () => {
    const session = new MultipartSession('big', 'u1');
    session.markFailed();
    expect(session.state).toBe('failed');

    session.markAborted();
    expect(session.state).toBe('aborted');

    session.markFailed();
    expect(session.state).toBe('aborted');
  });
});
