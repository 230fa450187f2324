import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

// The configured fee structure; at most one row is active.
@Entity({ schema: 'payments', name: 'fee_schedules' })
export class FeeSchedule {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ name: 'buyer_percentage', type: 'numeric', precision: 5, scale: 2 })
  buyerPercentage!: string;

  @Column({ name: 'seller_percentage', type: 'numeric', precision: 5, scale: 2 })
  sellerPercentage!: string;

  @Column({ name: 'min_fee', type: 'numeric', precision: 15, scale: 2 })
  minFee!: string;

  @Column({ name: 'max_fee', type: 'numeric', precision: 15, scale: 2, nullable: true })
  maxFee!: string | null;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
