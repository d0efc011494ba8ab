import { describe, it, expect } from 'vitest';
import {
  HEARTBEAT_STATUSES,
  HeartbeatError,
  InvalidStatusError,
  ServiceNotFoundError,
  DuplicateServiceError,
  isHeartbeatStatus,
  notificationLevelFor,
  parseHeartbeatStatus,
} from '../../src/domain/index.js';

describe('isHeartbeatStatus', () => {
  it('accepts every member of the enumeration', () => {
    for (const status of HEARTBEAT_STATUSES) {
      expect(isHeartbeatStatus(status)).toBe(true);
    }
  });

  it('rejects other casing, other strings and non-strings', () => {
    expect(isHeartbeatStatus('HEALTHY')).toBe(false);
    expect(isHeartbeatStatus('degraded')).toBe(false);
    expect(isHeartbeatStatus(42)).toBe(false);
    expect(isHeartbeatStatus(null)).toBe(false);
  });
});

describe('parseHeartbeatStatus', () => {
  it('normalises case and whitespace', () => {
    expect(parseHeartbeatStatus(' Warning ')).toBe('warning');
    expect(parseHeartbeatStatus('HEALTHY')).toBe('healthy');
  });

  it('throws InvalidStatusError for values outside the enumeration', () => {
    expect(() => parseHeartbeatStatus('not-a-real-status')).toThrow(InvalidStatusError);
    expect(() => parseHeartbeatStatus('not-a-real-status')).toThrow(
      'Invalid heartbeat status: "not-a-real-status"',
    );
  });

  it('throws for non-string input', () => {
    expect(() => parseHeartbeatStatus(undefined)).toThrow('Invalid heartbeat status: undefined');
    expect(() => parseHeartbeatStatus(7)).toThrow(InvalidStatusError);
  });
});

describe('notificationLevelFor', () => {
  it('maps healthy to success and error to error', () => {
    expect(notificationLevelFor('healthy')).toBe('success');
    expect(notificationLevelFor('error')).toBe('error');
  });

  it('maps every other status to warning', () => {
    expect(notificationLevelFor('unknown')).toBe('warning');
    expect(notificationLevelFor('busy')).toBe('warning');
    expect(notificationLevelFor('warning')).toBe('warning');
    expect(notificationLevelFor('stale')).toBe('warning');
  });
});

describe('error taxonomy', () => {
  it('exposes a stable code and the concrete class name', () => {
    const notFound = new ServiceNotFoundError('svc-1');
    expect(notFound).toBeInstanceOf(HeartbeatError);
    expect(notFound.name).toBe('ServiceNotFoundError');
    expect(notFound.code).toBe('SERVICE_NOT_FOUND');
    expect(notFound.message).toBe('Service svc-1 not found');

    const duplicate = new DuplicateServiceError('fixed-1');
    expect(duplicate.code).toBe('DUPLICATE_SERVICE');
    expect(duplicate.message).toBe('Service fixed-1 is already registered');
  });
});
