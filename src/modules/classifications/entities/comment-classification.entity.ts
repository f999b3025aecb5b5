import { Column, Entity, Index, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import { CommentCategory } from '../../scoring/comment-quality';

export type ClassificationStatus = 'classified' | 'unusable' | 'failed';

/**
 * One row per review comment the classifier has looked at. Only `classified`
 * rows carry a rating; `failed` rows are retried until their attempts run out.
 */
@Entity('comment_classifications')
export class CommentClassificationEntity {
  /** Review-comment id as stored on the raw event. */
  @PrimaryColumn()
  commentId!: string;

  @Index()
  @Column({ type: 'varchar', length: 16 })
  status!: ClassificationStatus;

  @Column({ type: 'int', default: 0 })
  attempts!: number;

  @Column({ type: 'varchar', length: 32, nullable: true })
  category!: CommentCategory | null;

  @Column({ type: 'int', nullable: true })
  qualityScore!: number | null;

  @Column({ type: 'text', nullable: true })
  lastError!: string | null;

  @UpdateDateColumn()
  classifiedAt!: Date;
}
