import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

/** Per-reviewer aggregate, rebuilt from scored sessions. */
@Entity('users')
export class UserEntity {
  @PrimaryColumn()
  login!: string;

  @Column({ default: 0 })
  xp!: number;

  @Column({ default: 1 })
  level!: number;

  @Column({ default: 0 })
  reviewSessionCount!: number;

  @Column({ default: 0 })
  fastReviewCount!: number;

  @Column({ default: 0 })
  thoroughReviewCount!: number;

  @Column({ default: 0 })
  deepReviewCount!: number;

  @Column({ default: 0 })
  nightSessionCount!: number;

  @Column({ default: 0 })
  currentStreakDays!: number;

  @Column({ default: 0 })
  longestStreakDays!: number;

  @Column({ default: 0 })
  maxSessionsInOneDay!: number;

  @Column({ default: 0 })
  bestSessionXp!: number;

  @Column({ type: 'varchar', length: 10, nullable: true })
  lastActiveDay!: string | null;

  @Column({ type: 'timestamp', nullable: true })
  lastSessionAt!: Date | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
