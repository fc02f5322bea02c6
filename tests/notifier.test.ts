import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  createAuditLogger,
  formatAlertBody,
  formatAlertSubject,
  Notifier,
  type ThreatNotice
} from '../src/mitigation/notifier.js';
import type { NotificationConfig } from '../src/config/index.js';
import type { CommandRunner, ExecOptions } from '../src/utils/exec.js';
import { createCaptureLogger } from './helpers/logging.js';

const NOTICE: ThreatNotice = {
  packageName: 'left-pad',
  anomalyScore: 0.85,
  riskLevel: 'high',
  detectedAt: '2024-06-01T12:00:00.000Z'
};

function notificationConfig(overrides: Partial<NotificationConfig> = {}): NotificationConfig {
  return {
    requireDelivery: true,
    email: { enabled: false, recipients: [], command: 'mail', timeoutMs: 500 },
    logging: { enabled: true, path: 'unused.log' },
    ...overrides
  };
}

function mailer(failFor: string[] = []) {
  const calls: Array<{ command: string; args: string[]; options?: ExecOptions }> = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const recipient = args[args.length - 1] ?? '';
    if (failFor.includes(recipient)) {
      throw new Error(`mail: cannot deliver to ${recipient}`);
    }
    return { stdout: '', stderr: '' };
  };
  return { run, calls };
}

describe('alert formatting', () => {
  it('names the package in the subject', () => {
    expect(formatAlertSubject(NOTICE)).toBe('Security Alert: Threat Detected in left-pad');
  });

  it('lists the detection details in the body', () => {
    expect(formatAlertBody(NOTICE)).toBe(
      [
        'A potential security threat was detected:',
        '',
        'Package: left-pad',
        'Anomaly Score: 0.850',
        'Risk Level: high',
        'Detection Time: 2024-06-01T12:00:00.000Z',
        ''
      ].join('\n')
    );
  });
});

describe('Notifier', () => {
  it('NotifyAudit writes a structured audit line', async () => {
    const audit = createCaptureLogger();
    const notifier = new Notifier(notificationConfig({ requireDelivery: false }), {
      audit: audit.log,
      log: createCaptureLogger().log
    });

    await expect(notifier.notify(NOTICE)).resolves.toEqual({ ok: true, channels: [{ channel: 'log', ok: true }] });
    expect(audit.entries()).toEqual([
      expect.objectContaining({
        level: 40,
        package: 'left-pad',
        anomaly_score: 0.85,
        risk_level: 'high',
        msg: 'Threat detected in package left-pad with anomaly score 0.850'
      })
    ]);
  });

  it('NotifyDelivery fails when only the local log received the alert', async () => {
    const log = createCaptureLogger();
    const notifier = new Notifier(notificationConfig(), { audit: createCaptureLogger().log, log: log.log });

    const result = await notifier.notify(NOTICE);

    expect(result).toEqual({ ok: false, channels: [{ channel: 'log', ok: true }] });
    expect(log.messages('warn')).toEqual(['Threat notification was not delivered externally']);
  });

  it('NotifyEmail mails every recipient with the alert body on stdin', async () => {
    const { run, calls } = mailer();
    const notifier = new Notifier(
      notificationConfig({
        email: { enabled: true, recipients: ['sec@example.test', 'ops@example.test'], command: 'mail', timeoutMs: 500 }
      }),
      { audit: null, run, log: createCaptureLogger().log }
    );

    const result = await notifier.notify(NOTICE);

    expect(result).toEqual({
      ok: true,
      channels: [
        { channel: 'email', target: 'sec@example.test', ok: true },
        { channel: 'email', target: 'ops@example.test', ok: true }
      ]
    });
    expect(calls).toEqual([
      {
        command: 'mail',
        args: ['-s', 'Security Alert: Threat Detected in left-pad', 'sec@example.test'],
        options: { input: formatAlertBody(NOTICE), timeoutMs: 500 }
      },
      {
        command: 'mail',
        args: ['-s', 'Security Alert: Threat Detected in left-pad', 'ops@example.test'],
        options: { input: formatAlertBody(NOTICE), timeoutMs: 500 }
      }
    ]);
  });

  it('NotifyEmailFailure reports the failed recipient and keeps mailing the rest', async () => {
    const { run, calls } = mailer(['sec@example.test']);
    const log = createCaptureLogger();
    const notifier = new Notifier(
      notificationConfig({
        email: { enabled: true, recipients: ['sec@example.test', 'ops@example.test'], command: 'mail', timeoutMs: 500 }
      }),
      { audit: createCaptureLogger().log, run, log: log.log }
    );

    const result = await notifier.notify(NOTICE);

    expect(calls).toHaveLength(2);
    expect(result).toEqual({
      ok: false,
      channels: [
        { channel: 'log', ok: true },
        {
          channel: 'email',
          target: 'sec@example.test',
          ok: false,
          reason: 'mail: cannot deliver to sec@example.test'
        },
        { channel: 'email', target: 'ops@example.test', ok: true }
      ]
    });
    expect(log.messages('error')).toEqual(['Failed to send email notification']);
    expect(log.messages('warn')).toEqual(['Threat notification failed on at least one channel']);
  });

  it('warns when email is enabled without recipients', async () => {
    const { run, calls } = mailer();
    const log = createCaptureLogger();
    const notifier = new Notifier(
      notificationConfig({ email: { enabled: true, recipients: [], command: 'mail', timeoutMs: 500 } }),
      { audit: createCaptureLogger().log, run, log: log.log }
    );

    await expect(notifier.notify(NOTICE)).resolves.toEqual({ ok: false, channels: [{ channel: 'log', ok: true }] });
    expect(calls).toEqual([]);
    expect(log.messages('warn')).toEqual([
      'Email notification enabled without recipients',
      'Threat notification was not delivered externally'
    ]);
  });

  it('skips the audit line when file logging is disabled', async () => {
    const audit = createCaptureLogger();
    const notifier = new Notifier(
      notificationConfig({ requireDelivery: false, logging: { enabled: false, path: 'unused.log' } }),
      { audit: audit.log, log: createCaptureLogger().log }
    );

    await expect(notifier.notify(NOTICE)).resolves.toEqual({ ok: true, channels: [] });
    expect(audit.entries()).toEqual([]);
  });
});

describe('Notifier audit file', () => {
  it('AuditUnavailable continues without an audit log when the path cannot be opened', async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-audit-'));
    const blocker = path.join(root, 'not-a-directory');
    fs.writeFileSync(blocker, '');
    const log = createCaptureLogger();
    try {
      const notifier = new Notifier(
        notificationConfig({ requireDelivery: false, logging: { enabled: true, path: path.join(blocker, 'mitigation.log') } }),
        { log: log.log }
      );

      expect(notifier.auditLog).toBeNull();
      expect(log.messages('warn')).toEqual(['Mitigation audit log unavailable, continuing without it']);
      await expect(notifier.notify(NOTICE)).resolves.toEqual({ ok: true, channels: [] });
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});

describe('createAuditLogger', () => {
  it('appends JSON lines to the audit file, creating its directory', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-audit-'));
    const filePath = path.join(root, 'logs', 'mitigation.log');
    try {
      createAuditLogger(filePath).warn({ package: 'left-pad' }, 'Threat detected');

      const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        level: 40,
        name: 'mitigation',
        package: 'left-pad',
        msg: 'Threat detected'
      });
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});
