import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { Message } from './message.entity';

@Entity('info_sources')
export class InfoSource {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  messageId!: string;

  @Column()
  documentName!: string;

  @Column()
  collection!: string;

  @Column()
  chunkKey!: string;

  @Column('text')
  excerpt!: string;

  @Column({ type: 'float' })
  score!: number;

  @Column({ type: 'int' })
  position!: number;

  @ManyToOne(() => Message, message => message.source, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'messageId' })
  message!: Message;
}
