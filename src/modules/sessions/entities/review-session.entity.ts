import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { SessionComment, SessionStateChange } from '../session.types';
import { XpBreakdown } from '../../scoring/scoring.engine';
import { numericTransformer } from '../../../utils/typeorm.transformers';

@Entity('review_sessions')
@Index('idx_review_sessions_pr', ['repositoryId', 'pullRequest'])
@Index('idx_review_sessions_reviewer', ['reviewer', 'windowStart'])
export class ReviewSessionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  repositoryId!: number;

  @Column()
  pullRequest!: number;

  @Column()
  reviewer!: string;

  @Column({ type: 'timestamp' })
  windowStart!: Date;

  @Column({ type: 'timestamp' })
  windowEnd!: Date;

  @Column({ default: 0 })
  commentCount!: number;

  @Column({ default: 0 })
  substantiveCommentCount!: number;

  @Column({ type: 'varchar', length: 32, nullable: true })
  stateChange!: SessionStateChange | null;

  @Column({ type: 'bigint', nullable: true, transformer: numericTransformer })
  elapsedSinceLastCommitMs!: number | null;

  @Column({ type: 'simple-json' })
  comments!: SessionComment[];

  @Column({ default: 0 })
  xpEarned!: number;

  @Column({ type: 'simple-json' })
  breakdown!: XpBreakdown;
}
