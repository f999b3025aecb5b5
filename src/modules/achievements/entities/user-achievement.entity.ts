import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('user_achievements')
@Index('idx_user_achievements_pending', ['notifiedAt'])
export class UserAchievementEntity {
  @PrimaryColumn()
  user!: string;

  @PrimaryColumn()
  achievementId!: string;

  @Column({ type: 'timestamp' })
  unlockedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  notifiedAt!: Date | null;
}
