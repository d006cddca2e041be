import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, OneToMany, JoinColumn, Index } from 'typeorm';
import { Conversation } from './conversation.entity';
import { InfoSource } from './info-source.entity';

@Entity('messages')
@Index(['conversationId', 'ts'])
export class Message {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  conversationId!: string;

  @Column({ nullable: true, type: 'varchar' })
  userId!: string | null;

  @Column()
  role!: string; // 'user' | 'assistant'

  @Column('text')
  content!: string;

  @Column({ nullable: true, type: 'float' })
  confidence!: number | null;

  @Column({ nullable: true, type: 'int' })
  tokensUsed!: number | null;

  // Set by the pipeline, millisecond precision keeps a user/assistant pair ordered.
  @Column({ type: 'datetime', precision: 3 })
  ts!: Date;

  @ManyToOne(() => Conversation, conversation => conversation.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'conversationId' })
  conversation!: Conversation;

  @OneToMany(() => InfoSource, infoSource => infoSource.message)
  source!: InfoSource[];
}
