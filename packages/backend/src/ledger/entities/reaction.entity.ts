import {
  Entity,
  Column,
  PrimaryColumn,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Broadcast } from './broadcast.entity';

@Entity('reactions')
@Index(['broadcastId', 'reactorAddress'], { unique: true }) // One row per reactor per broadcast
@Index(['processed', 'isActive', 'createdAt'])
export class Reaction {
  @PrimaryColumn('uuid')
  id!: string;

  @Column('uuid')
  broadcastId!: string;

  @Column()
  reactorAddress!: string;

  @Column()
  reactorName!: string;

  @Column('varchar', { length: 100 })
  emoji!: string;

  @Column('varchar', { length: 100, nullable: true })
  previousEmoji!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  // Set once a digest has included the reaction; never cleared
  @Column({ default: false })
  processed!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @ManyToOne(() => Broadcast, broadcast => broadcast.reactions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'broadcastId' })
  broadcast!: Broadcast;
}
