import { Entity, Column, PrimaryColumn, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { Reaction } from './reaction.entity';

@Entity('broadcasts')
@Index(['createdAt'])
export class Broadcast {
  @PrimaryColumn('uuid')
  id!: string;

  @Column()
  senderAddress!: string;

  @Column()
  senderName!: string;

  @Column('text')
  text!: string;

  @Column({ type: 'jsonb', default: '[]' })
  mediaUrls!: string[];

  // Derived from the active reactions; written only by the reaction aggregator
  @Column({ type: 'text', nullable: true })
  reactionSummary!: string | null;

  @Column({ type: 'timestamp', nullable: true })
  lastReactionUpdate!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => Reaction, reaction => reaction.broadcast)
  reactions!: Reaction[];
}
