/**
 * Tests for TelegramReportSink
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { TelegramReportSink } from '../../src/reporting/TelegramReportSink.js';
import {
  formatShutdownMessage,
  formatStartupMessage,
  formatWindowMessage,
} from '../../src/reporting/formatter.js';
import type { MessageSender } from '../../src/reporting/types.js';
import { EMPTY_SESSION } from '../../src/scheduler/SessionStats.js';
import { winReport } from './fixtures.js';

const NOW = 1_700_001_000_000;

describe('TelegramReportSink', () => {
  let sendMessage: Mock<MessageSender['sendMessage']>;
  let sink: TelegramReportSink;

  beforeEach(() => {
    sendMessage = vi.fn<MessageSender['sendMessage']>().mockResolvedValue(true);
    sink = new TelegramReportSink({ sendMessage }, () => NOW);
  });

  it('should send the window summary', async () => {
    const report = winReport();

    await sink.recordWindow(report);

    expect(sendMessage).toHaveBeenCalledWith(formatWindowMessage(report));
    expect(sink.name).toBe('telegram');
  });

  it('should fail when the summary is not delivered', async () => {
    sendMessage.mockResolvedValue(false);

    await expect(sink.recordWindow(winReport())).rejects.toThrow(
      'Window report for btc-updown-15m-1700000100 was not delivered'
    );
  });

  it('should send startup and shutdown notices', async () => {
    await sink.notifyStartup('live', 'kinetic');
    await sink.notifyShutdown('Received SIGTERM', EMPTY_SESSION);

    expect(sendMessage.mock.calls).toEqual([
      [formatStartupMessage('live', 'kinetic', NOW)],
      [formatShutdownMessage('Received SIGTERM', EMPTY_SESSION, NOW)],
    ]);
  });

  it('should not throw when a notice is not delivered', async () => {
    sendMessage.mockResolvedValue(false);

    await expect(sink.notifyStartup('paper', 'balanced')).resolves.toBeUndefined();
  });
});
