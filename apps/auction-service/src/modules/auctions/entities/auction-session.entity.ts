import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { BidIncrementPolicy, SessionStatus } from '@gemhouse/shared';

export interface SessionRules {
  bidIncrementPolicy: BidIncrementPolicy;
  /** When false, enrollments are approved on request. */
  requireRegistration: boolean;
  /** Overrides of the active fee schedule, in percent. */
  buyerFeePercentage?: string;
  sellerFeePercentage?: string;
  /** A bid this close to `endAt` pushes `endAt` back by the extension. */
  antiSnipingEnabled: boolean;
  antiSnipingTriggerSeconds: number;
  antiSnipingExtensionSeconds: number;
}

export const DEFAULT_SESSION_RULES: SessionRules = {
  bidIncrementPolicy: BidIncrementPolicy.FIXED,
  requireRegistration: true,
  antiSnipingEnabled: true,
  antiSnipingTriggerSeconds: 60,
  antiSnipingExtensionSeconds: 300,
};

@Entity({ schema: 'auctions', name: 'sessions' })
export class AuctionSession {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'start_at', type: 'timestamptz' })
  startAt!: Date;

  @Column({ name: 'end_at', type: 'timestamptz' })
  endAt!: Date;

  @Column({ type: 'enum', enum: SessionStatus, enumName: 'session_status', default: SessionStatus.DRAFT })
  status!: SessionStatus;

  @Column({ name: 'assigned_staff_id', type: 'uuid', nullable: true })
  assignedStaffId!: string | null;

  @Column({ type: 'jsonb' })
  rules!: SessionRules;

  @Column({ name: 'created_by', type: 'uuid' })
  createdBy!: string;

  @Column({ name: 'opened_at', type: 'timestamptz', nullable: true })
  openedAt!: Date | null;

  @Column({ name: 'closed_at', type: 'timestamptz', nullable: true })
  closedAt!: Date | null;

  @Column({ name: 'settled_at', type: 'timestamptz', nullable: true })
  settledAt!: Date | null;

  @Column({ name: 'canceled_at', type: 'timestamptz', nullable: true })
  canceledAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
