import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { BidStatus } from '@gemhouse/shared';

// At most one WINNING bid per lot, enforced by a partial unique index.
@Entity({ schema: 'auctions', name: 'bids' })
@Index('uq_bids_one_winner', ['sessionItemId'], { unique: true, where: "status = 'winning'" })
@Index('uq_bids_idempotency', ['sessionItemId', 'bidderId', 'idempotencyKey'], { unique: true })
export class Bid {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'session_id', type: 'uuid' })
  sessionId!: string;

  @Column({ name: 'session_item_id', type: 'uuid' })
  sessionItemId!: string;

  @Column({ name: 'bidder_id', type: 'uuid' })
  bidderId!: string;

  @Column({ type: 'numeric', precision: 15, scale: 2 })
  amount!: string;

  @Column({ type: 'enum', enum: BidStatus, enumName: 'bid_status', default: BidStatus.VALID })
  status!: BidStatus;

  @Column({ type: 'varchar', name: 'idempotency_key', length: 255, nullable: true })
  idempotencyKey!: string | null;

  @Column({ name: 'placed_at', type: 'timestamptz' })
  placedAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
