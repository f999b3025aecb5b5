import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { RawEventType, ReviewState } from '../raw-event.types';
import { numericTransformer } from '../../../utils/typeorm.transformers';

@Entity('raw_events')
@Index('idx_raw_events_pr', ['repositoryId', 'pullRequest'])
export class RawEventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column()
  eventKey!: string;

  @Column()
  repositoryId!: number;

  @Column()
  pullRequest!: number;

  @Column()
  pullRequestAuthor!: string;

  @Column({ type: 'varchar', length: 32 })
  type!: RawEventType;

  @Column({ type: 'varchar', nullable: true })
  actor!: string | null;

  @Column()
  occurredAt!: Date;

  @Column({ type: 'bigint', default: 0, transformer: numericTransformer })
  sequence!: number;

  @Column({ type: 'varchar', nullable: true })
  sha!: string | null;

  /** Review id or review-comment id, depending on `type`. */
  @Column({ type: 'varchar', nullable: true })
  sourceId!: string | null;

  @Column({ type: 'varchar', length: 32, nullable: true })
  reviewState!: ReviewState | null;

  @Column({ type: 'text', nullable: true })
  body!: string | null;

  @Column({ type: 'varchar', nullable: true })
  path!: string | null;

  @Column({ type: 'int', nullable: true })
  line!: number | null;

  @Column({ type: 'varchar', nullable: true })
  inReplyTo!: string | null;

  @CreateDateColumn()
  ingestedAt!: Date;
}
