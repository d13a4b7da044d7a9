import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type AuditLogDocument = HydratedDocument<AuditLog>;

export const AUDIT_RESOURCE_TYPES = ['shifts', 'doctors', 'patients', 'appointments', 'invoices'] as const;
export type AuditResourceType = (typeof AUDIT_RESOURCE_TYPES)[number];
export type AuditAction = 'create' | 'update' | 'delete';
export type AuditSeverity = 'low' | 'medium';

@Schema({ timestamps: true, collection: 'audit_logs' })
export class AuditLog {
  @Prop({ required: true, enum: [...AUDIT_RESOURCE_TYPES] })
  resourceType!: AuditResourceType;

  @Prop({ required: true, enum: ['create', 'update', 'delete'] })
  action!: AuditAction;

  @Prop({ required: true })
  resourceId!: string;

  @Prop({ type: Object })
  oldValue?: Record<string, unknown>;

  @Prop({ type: Object })
  newValue?: Record<string, unknown>;

  @Prop()
  ipAddress?: string;

  @Prop()
  userAgent?: string;

  @Prop({ required: true })
  timestamp!: Date;

  @Prop({ enum: ['low', 'medium'], required: true })
  severity!: AuditSeverity;

  @Prop({ required: true })
  success!: boolean;

  @Prop({ required: true })
  fingerprint!: string;

  @Prop({ required: true })
  retentionDate!: Date;
}

export const AuditLogSchema = SchemaFactory.createForClass(AuditLog);

// Indexes for performance
AuditLogSchema.index({ resourceType: 1, resourceId: 1, timestamp: -1 });
AuditLogSchema.index({ fingerprint: 1 }, { unique: true });

// TTL index for automatic cleanup
AuditLogSchema.index({ retentionDate: 1 }, { expireAfterSeconds: 0 });
