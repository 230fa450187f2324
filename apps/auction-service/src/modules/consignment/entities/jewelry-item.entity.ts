import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { JewelryStatus } from '@gemhouse/shared';

@Entity({ schema: 'consignment', name: 'jewelry_items' })
export class JewelryItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  attributes!: Record<string, string>;

  // grams
  @Column({ type: 'numeric', precision: 10, scale: 3, nullable: true })
  weight!: string | null;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  photos!: string[];

  @Column({ name: 'owner_id', type: 'uuid' })
  ownerId!: string;

  @Column({
    type: 'enum',
    enum: JewelryStatus,
    enumName: 'jewelry_status',
    default: JewelryStatus.PENDING_APPRAISAL,
  })
  status!: JewelryStatus;

  @Column({ name: 'estimated_price', type: 'numeric', precision: 15, scale: 2, nullable: true })
  estimatedPrice!: string | null;

  @Column({ name: 'reserve_price', type: 'numeric', precision: 15, scale: 2, nullable: true })
  reservePrice!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
