import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { AuthorizationStatus, Protocol, VerificationStatus } from '../../../../core';

/**
 * TypeORM entity for Authorization
 */
@Entity('authorizations')
@Index(['tenantId', 'status'])
@Index(['tenantId', 'tokenId'])
@Index(['status', 'expiresAt'])
@Index(['deletedAt'])
export class AuthorizationEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ type: 'enum', enum: Protocol })
  protocol!: Protocol;

  @Column()
  issuer!: string;

  @Column()
  subject!: string;

  @Column({ type: 'jsonb', default: {} })
  scope!: Record<string, unknown>;

  @Column({ name: 'amount_limit', type: 'numeric', precision: 18, scale: 2, nullable: true })
  amountLimit!: string | null;

  @Column({ type: 'varchar', length: 3, nullable: true })
  currency!: string | null;

  @Column({ name: 'expires_at', type: 'timestamptz' })
  expiresAt!: Date;

  @Column({ type: 'enum', enum: AuthorizationStatus })
  status!: AuthorizationStatus;

  @Column({ name: 'raw_payload', type: 'jsonb' })
  rawPayload!: Record<string, unknown>;

  @Column({ name: 'token_id', type: 'varchar', nullable: true })
  tokenId!: string | null;

  @Column({
    name: 'verification_status',
    type: 'enum',
    enum: VerificationStatus,
    default: VerificationStatus.PENDING,
  })
  verificationStatus!: VerificationStatus;

  @Column({ name: 'verification_reason', type: 'varchar', nullable: true })
  verificationReason!: string | null;

  @Column({ name: 'verification_details', type: 'jsonb', default: {} })
  verificationDetails!: Record<string, unknown>;

  @Column({ name: 'verified_at', type: 'timestamptz', nullable: true })
  verifiedAt!: Date | null;

  @Column({ name: 'retention_days', type: 'int', default: 90 })
  retentionDays!: number;

  @Column({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;

  @Column({ name: 'revoked_at', type: 'timestamptz', nullable: true })
  revokedAt!: Date | null;

  @Column({ name: 'revoke_reason', type: 'text', nullable: true })
  revokeReason!: string | null;

  @Column({ name: 'created_by', type: 'varchar', nullable: true })
  createdBy!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
