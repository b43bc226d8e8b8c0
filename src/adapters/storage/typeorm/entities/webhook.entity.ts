import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { WebhookEventType } from '../../../../core';

/**
 * TypeORM entity for Webhook subscriptions
 */
@Entity('webhooks')
@Index(['tenantId', 'isActive'])
export class WebhookEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column()
  name!: string;

  @Column({ type: 'text' })
  url!: string;

  @Column({ type: 'jsonb', default: [] })
  events!: WebhookEventType[];

  @Column()
  secret!: string;

  @Column({ name: 'is_active', default: true })
  isActive!: boolean;

  @Column({ name: 'max_retries', type: 'int', default: 3 })
  maxRetries!: number;

  @Column({ name: 'retry_delay_seconds', type: 'int', default: 60 })
  retryDelaySeconds!: number;

  @Column({ name: 'timeout_seconds', type: 'int', default: 30 })
  timeoutSeconds!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
