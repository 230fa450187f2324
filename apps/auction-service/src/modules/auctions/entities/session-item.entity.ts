import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { SessionItemStatus } from '@gemhouse/shared';

// A lot. Lot numbers run 1..N per session with no gaps.
@Entity({ schema: 'auctions', name: 'session_items' })
@Index('uq_session_items_lot', ['sessionId', 'lotNumber'], { unique: true })
@Index('uq_session_items_jewelry', ['sessionId', 'jewelryItemId'], { unique: true })
export class SessionItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'session_id', type: 'uuid' })
  sessionId!: string;

  @Column({ name: 'jewelry_item_id', type: 'uuid' })
  jewelryItemId!: string;

  @Column({ name: 'sell_request_id', type: 'uuid' })
  sellRequestId!: string;

  @Column({ name: 'lot_number', type: 'integer' })
  lotNumber!: number;

  @Column({ name: 'reserve_price', type: 'numeric', precision: 15, scale: 2, nullable: true })
  reservePrice!: string | null;

  @Column({ name: 'start_price', type: 'numeric', precision: 15, scale: 2 })
  startPrice!: string;

  @Column({ name: 'step_price', type: 'numeric', precision: 15, scale: 2 })
  stepPrice!: string;

  // Denormalised from the WINNING bid, written in the same transaction.
  @Column({ name: 'current_highest_bid', type: 'numeric', precision: 15, scale: 2, nullable: true })
  currentHighestBid!: string | null;

  @Column({ name: 'current_winner_id', type: 'uuid', nullable: true })
  currentWinnerId!: string | null;

  @Column({ type: 'integer', name: 'bid_count', default: 0 })
  bidCount!: number;

  @Column({
    type: 'enum',
    enum: SessionItemStatus,
    enumName: 'session_item_status',
    default: SessionItemStatus.PENDING,
  })
  status!: SessionItemStatus;

  @Column({ name: 'closed_at', type: 'timestamptz', nullable: true })
  closedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
