/**
 * Tests for the audit middleware.
 *
 * createAudit() writes one pino record per executed command (subsystem
 * 'audit') and hands the same entry to an optional sink.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createTestContext } from '../../../../tests/helpers/context.js';
import type { AuditEntry } from '../audit.js';

// Hoist mock functions so vi.mock factories can reference them
const { mockLogInfo, mockLogWarn, mockGetLogger } = vi.hoisted(() => {
  const mockLogInfo = vi.fn();
  const mockLogWarn = vi.fn();
  return {
    mockLogInfo,
    mockLogWarn,
    mockGetLogger: vi.fn(() => ({ info: mockLogInfo, warn: mockLogWarn })),
  };
});

vi.mock('../../../core/logger.js', () => ({
  getLogger: mockGetLogger,
}));

import { createAudit } from '../audit.js';

describe('createAudit middleware', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('logs a successful command under the audit subsystem', async () => {
    const entries: AuditEntry[] = [];
    const audit = createAudit((entry) => entries.push(entry));

    await audit(createTestContext(['myrepo', 'extra']), async () => {});

    expect(mockGetLogger).toHaveBeenCalledWith('audit');
    expect(mockLogInfo).toHaveBeenCalledTimes(1);
    expect(mockLogWarn).not.toHaveBeenCalled();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      command: 'image pull',
      options: ['-v', '--tag'],
      argCount: 2,
      success: true,
    });
    expect(entries[0]?.error).toBeUndefined();
    expect(mockLogInfo).toHaveBeenCalledWith(entries[0], 'command executed');
  });

  it('never records option values', async () => {
    const entries: AuditEntry[] = [];
    await createAudit((entry) => entries.push(entry))(createTestContext(), async () => {});
    expect(JSON.stringify(entries[0])).not.toContain('test-value');
  });

  it('logs and rethrows a failing command', async () => {
    const entries: AuditEntry[] = [];
    const audit = createAudit((entry) => entries.push(entry));

    await expect(audit(createTestContext(), async () => {
      throw new Error('registry unreachable');
    })).rejects.toThrow('registry unreachable');

    expect(mockLogInfo).not.toHaveBeenCalled();
    expect(mockLogWarn).toHaveBeenCalledTimes(1);
    expect(entries[0]).toMatchObject({
      command: 'image pull',
      success: false,
      error: 'registry unreachable',
    });
    expect(mockLogWarn).toHaveBeenCalledWith(entries[0], 'command failed');
  });

  it('records a non-negative duration', async () => {
    const entries: AuditEntry[] = [];
    await createAudit((entry) => entries.push(entry))(createTestContext(), async () => {});
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('works without a sink', async () => {
    await expect(createAudit()(createTestContext(), async () => {})).resolves.toBeUndefined();
    expect(mockLogInfo).toHaveBeenCalledTimes(1);
  });
});
