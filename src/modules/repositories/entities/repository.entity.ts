import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { numericTransformer } from '../../../utils/typeorm.transformers';

@Entity('repositories')
export class RepositoryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'bigint', nullable: true, transformer: numericTransformer })
  githubId!: number | null;

  @Column()
  owner!: string;

  @Column()
  name!: string;

  @Index({ unique: true })
  @Column()
  fullName!: string;

  @CreateDateColumn()
  trackedSince!: Date;

  /** Cursor: only the sync coordinator writes these two, together. */
  @Column({ type: 'timestamp', nullable: true })
  lastSyncedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  syncCursor!: string | null;
}
