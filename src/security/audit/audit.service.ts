import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ConfigService } from '@nestjs/config';
import { Model } from 'mongoose';
import { createHash } from 'crypto';
import {
  AuditAction,
  AuditLog,
  AuditResourceType,
  AuditSeverity,
} from './schemas/audit-log.schema';

export interface AuditMetadata {
  ipAddress?: string;
  userAgent?: string;
}

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'key'];

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectModel(AuditLog.name) private auditLogModel: Model<AuditLog>,
    private configService: ConfigService,
  ) {}

  /**
   * Logs a write to a scheduling resource
   */
  async logDataAccess(
    resourceType: AuditResourceType,
    action: AuditAction,
    resourceId: string,
    oldValue?: object | null,
    newValue?: object | null,
    metadata?: AuditMetadata,
  ): Promise<void> {
    if (this.configService.get<boolean>('audit.enabled') === false) {
      return;
    }

    const timestamp = new Date();
    const entry = {
      resourceType,
      action,
      resourceId,
      oldValue: sanitize(oldValue),
      newValue: sanitize(newValue),
      ipAddress: metadata?.ipAddress,
      userAgent: metadata?.userAgent,
      timestamp,
      severity: this.determineSeverity(action),
      success: true,
    };

    try {
      await this.auditLogModel.create({
        ...entry,
        fingerprint: fingerprint(entry),
        retentionDate: this.retentionDate(timestamp),
      });

      this.logger.log(`Audit log created: ${action} ${resourceType}/${resourceId}`);
    } catch (error) {
      // Audit failures must not undo a write that already happened
      this.logger.error(
        `Failed to create audit log for ${action} ${resourceType}/${resourceId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private determineSeverity(action: AuditAction): AuditSeverity {
    return action === 'delete' ? 'medium' : 'low';
  }

  private retentionDate(from: Date): Date {
    const retentionDays =
      this.configService.get<number>('audit.retention.dataAccess') ?? 3653;
    const retentionDate = new Date(from);
    retentionDate.setDate(retentionDate.getDate() + retentionDays);
    return retentionDate;
  }
}

function fingerprint(entry: object): string {
  return createHash('sha256').update(JSON.stringify(entry)).digest('hex');
}

/**
 * Deep-copies a value through JSON and masks keys that look like credentials.
 */
export function sanitize(value?: object | null): Record<string, unknown> | undefined {
  if (!value) {
    return undefined;
  }

  const copy: unknown = JSON.parse(JSON.stringify(value));
  return isRecord(copy) ? redact(copy) : undefined;
}

function redact(record: Record<string, unknown>): Record<string, unknown> {
  for (const [key, nested] of Object.entries(record)) {
    if (SENSITIVE_FIELDS.some((field) => key.toLowerCase().includes(field))) {
      record[key] = '[REDACTED]';
    } else if (isRecord(nested)) {
      redact(nested);
    }
  }
  return record;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
