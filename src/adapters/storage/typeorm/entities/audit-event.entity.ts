import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
} from 'typeorm';
import { AuditEventType } from '../../../../core';

/**
 * TypeORM entity for AuditEvent
 * No foreign key: the trail outlives a purged authorization
 */
@Entity('audit_events')
@Index(['authorizationId', 'createdAt'])
@Index(['tenantId', 'eventType'])
export class AuditEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'authorization_id', type: 'uuid' })
  authorizationId!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ name: 'event_type', type: 'enum', enum: AuditEventType })
  eventType!: AuditEventType;

  @Column({ type: 'text' })
  description!: string;

  @Column()
  actor!: string;

  @Column({ type: 'varchar', nullable: true })
  ip!: string | null;

  @Column({ name: 'user_agent', type: 'varchar', nullable: true })
  userAgent!: string | null;

  @Column({ name: 'event_data', type: 'jsonb', default: {} })
  eventData!: Record<string, unknown>;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
