import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
} from 'typeorm';
import { InboundEventStatus } from '../../../../core';

/**
 * TypeORM entity for inbound protocol webhook events
 */
@Entity('inbound_events')
@Index(['tenantId', 'eventId'], { unique: true })
@Index(['tokenId'])
export class InboundEventEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ name: 'event_id' })
  eventId!: string;

  @Column({ name: 'event_type' })
  eventType!: string;

  @Column({ name: 'token_id', type: 'varchar', nullable: true })
  tokenId!: string | null;

  @Column({ type: 'jsonb' })
  payload!: Record<string, unknown>;

  @Column({ type: 'enum', enum: InboundEventStatus, default: InboundEventStatus.PROCESSING })
  status!: InboundEventStatus;

  @Column({ name: 'authorization_id', type: 'uuid', nullable: true })
  authorizationId!: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;

  @Column({ name: 'claimed_until', type: 'timestamptz', nullable: true })
  claimedUntil!: Date | null;
}
