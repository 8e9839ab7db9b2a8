import { Entity, Column, PrimaryColumn, CreateDateColumn, Index } from 'typeorm';
import { DeliveryStatus, MessageKind } from '@rollcall/common';

@Entity('delivery_attempts')
@Index(['messageId'])
export class DeliveryAttempt {
  @PrimaryColumn('uuid')
  id!: string;

  // A broadcast id, or the fresh id of a digest, reaction update or reply
  @Column('uuid')
  messageId!: string;

  @Column({
    type: 'enum',
    enum: MessageKind,
    default: MessageKind.BROADCAST
  })
  messageKind!: MessageKind;

  @Column()
  recipientAddress!: string;

  @Column({
    type: 'enum',
    enum: DeliveryStatus,
    default: DeliveryStatus.PENDING
  })
  status!: DeliveryStatus;

  @Column({ type: 'varchar', nullable: true })
  providerId!: string | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  @Column({ type: 'int', default: 0 })
  durationMs!: number;

  @Column({ type: 'int', default: 0 })
  retryCount!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
