import pino from 'pino';
import logger, { type Logger } from '../logger.js';
import type { NotificationConfig } from '../config/index.js';
import { describeError, type ChannelOutcome, type NotifyResult } from '../types.js';
import { execFileAsync, type CommandRunner } from '../utils/exec.js';

export type ThreatNotice = {
  packageName: string;
  anomalyScore: number;
  riskLevel: string;
  detectedAt: string;
};

export interface NotifierDependencies {
  /** Destination of the mitigation audit trail; omitted when file logging is disabled. */
  audit?: Logger | null;
  run?: CommandRunner;
  log?: Logger;
}

export function createAuditLogger(filePath: string, name = 'mitigation'): Logger {
  return pino({ name }, pino.destination({ dest: filePath, mkdir: true, sync: true }));
}

export function formatAlertSubject(notice: ThreatNotice) {
  return `Security Alert: Threat Detected in ${notice.packageName}`;
}

export function formatAlertBody(notice: ThreatNotice) {
  return [
    'A potential security threat was detected:',
    '',
    `Package: ${notice.packageName}`,
    `Anomaly Score: ${notice.anomalyScore.toFixed(3)}`,
    `Risk Level: ${notice.riskLevel}`,
    `Detection Time: ${notice.detectedAt}`,
    ''
  ].join('\n');
}

/**
 * Writes a structured line to the audit trail and mails each configured
 * recipient. With `requireDelivery`, success also needs an alert that left the
 * host: a log line alone does not count.
 */
export class Notifier {
  private readonly config: NotificationConfig;
  private readonly audit: Logger | null;
  private readonly run: CommandRunner;
  private readonly log: Logger;

  constructor(config: NotificationConfig, dependencies: NotifierDependencies = {}) {
    this.config = config;
    this.run = dependencies.run ?? execFileAsync;
    this.log = (dependencies.log ?? logger).child({ component: 'notifier' });
    this.audit = dependencies.audit !== undefined ? dependencies.audit : this.openAuditLog();
  }

  private openAuditLog(): Logger | null {
    if (!this.config.logging.enabled) {
      return null;
    }
    try {
      return createAuditLogger(this.config.logging.path);
    } catch (error) {
      this.log.warn(
        { err: error, path: this.config.logging.path },
        'Mitigation audit log unavailable, continuing without it'
      );
      return null;
    }
  }

  get auditLog(): Logger | null {
    return this.audit;
  }

  async notify(notice: ThreatNotice): Promise<NotifyResult> {
    const channels: ChannelOutcome[] = [];

    if (this.config.logging.enabled && this.audit) {
      channels.push(this.writeAuditLine(notice));
    }

    if (this.config.email.enabled) {
      channels.push(...(await this.sendEmail(notice)));
    }

    const failed = channels.some(channel => !channel.ok);
    const delivered = channels.some(channel => channel.channel === 'email' && channel.ok);
    const ok = !failed && (!this.config.requireDelivery || delivered);

    if (!ok) {
      this.log.warn(
        { packageName: notice.packageName, channels, requireDelivery: this.config.requireDelivery },
        failed ? 'Threat notification failed on at least one channel' : 'Threat notification was not delivered externally'
      );
    }
    return { ok, channels };
  }

  private writeAuditLine(notice: ThreatNotice): ChannelOutcome {
    try {
      this.audit?.warn(
        { package: notice.packageName, anomaly_score: notice.anomalyScore, risk_level: notice.riskLevel },
        `Threat detected in package ${notice.packageName} with anomaly score ${notice.anomalyScore.toFixed(3)}`
      );
      return { channel: 'log', ok: true };
    } catch (error) {
      return { channel: 'log', ok: false, reason: describeError(error) };
    }
  }

  private async sendEmail(notice: ThreatNotice): Promise<ChannelOutcome[]> {
    const { recipients, command, timeoutMs } = this.config.email;
    if (recipients.length === 0) {
      this.log.warn({ packageName: notice.packageName }, 'Email notification enabled without recipients');
      return [];
    }

    const subject = formatAlertSubject(notice);
    const body = formatAlertBody(notice);
    const outcomes: ChannelOutcome[] = [];
    for (const recipient of recipients) {
      try {
        await this.run(command, ['-s', subject, recipient], { input: body, timeoutMs });
        outcomes.push({ channel: 'email', target: recipient, ok: true });
      } catch (error) {
        this.log.error({ err: error, recipient }, 'Failed to send email notification');
        outcomes.push({ channel: 'email', target: recipient, ok: false, reason: describeError(error) });
      }
    }
    return outcomes;
  }
}
