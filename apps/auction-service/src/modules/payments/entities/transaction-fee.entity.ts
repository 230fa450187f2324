import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { FeeKind } from '@gemhouse/shared';

// APPEND-ONLY: one row per lot and kind, written at settlement.
@Entity({ schema: 'payments', name: 'transaction_fees' })
@Index('uq_transaction_fees_item_kind', ['sessionItemId', 'kind'], { unique: true })
export class TransactionFee {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'session_item_id', type: 'uuid' })
  sessionItemId!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Column({ type: 'enum', enum: FeeKind, enumName: 'fee_kind' })
  kind!: FeeKind;

  @Column({ type: 'numeric', precision: 5, scale: 2 })
  percentage!: string;

  @Column({ type: 'numeric', precision: 15, scale: 2 })
  amount!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
