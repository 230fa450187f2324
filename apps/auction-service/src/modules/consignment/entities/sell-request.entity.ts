import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { SellRequestStatus } from '@gemhouse/shared';

@Entity({ schema: 'consignment', name: 'sell_requests' })
export class SellRequest {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'seller_id', type: 'uuid' })
  sellerId!: string;

  @Column({ name: 'jewelry_item_id', type: 'uuid', unique: true })
  jewelryItemId!: string;

  @Column({
    type: 'enum',
    enum: SellRequestStatus,
    enumName: 'sell_request_status',
    default: SellRequestStatus.SUBMITTED,
  })
  status!: SellRequestStatus;

  @Column({ name: 'seller_notes', type: 'text', nullable: true })
  sellerNotes!: string | null;

  @Column({ name: 'staff_notes', type: 'text', nullable: true })
  staffNotes!: string | null;

  @Column({ name: 'manager_notes', type: 'text', nullable: true })
  managerNotes!: string | null;

  @Column({ name: 'rejection_reason', type: 'text', nullable: true })
  rejectionReason!: string | null;

  // One stamp per stage; each forward step requires its predecessor's.
  @Column({ name: 'submitted_at', type: 'timestamptz', nullable: true })
  submittedAt!: Date | null;

  @Column({ name: 'appraised_at', type: 'timestamptz', nullable: true })
  appraisedAt!: Date | null;

  @Column({ name: 'received_at', type: 'timestamptz', nullable: true })
  receivedAt!: Date | null;

  @Column({ name: 'final_appraised_at', type: 'timestamptz', nullable: true })
  finalAppraisedAt!: Date | null;

  @Column({ name: 'approved_at', type: 'timestamptz', nullable: true })
  approvedAt!: Date | null;

  @Column({ name: 'accepted_at', type: 'timestamptz', nullable: true })
  acceptedAt!: Date | null;

  @Column({ name: 'assigned_at', type: 'timestamptz', nullable: true })
  assignedAt!: Date | null;

  @Column({ name: 'rejected_at', type: 'timestamptz', nullable: true })
  rejectedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
