import { UserAchievementEntity } from '../src/modules/achievements/entities/user-achievement.entity';
import { CommentClassificationEntity } from '../src/modules/classifications/entities/comment-classification.entity';
import { RawEventEntity } from '../src/modules/events/entities/raw-event.entity';
import { RepositoryEntity } from '../src/modules/repositories/entities/repository.entity';
import { SeasonEntity } from '../src/modules/seasons/entities/season.entity';
import { ReviewSessionEntity } from '../src/modules/sessions/entities/review-session.entity';
import { TeamMemberEntity } from '../src/modules/teams/entities/team-member.entity';
import { TeamEntity } from '../src/modules/teams/entities/team.entity';
import { UserEntity } from '../src/modules/users/entities/user.entity';
import { InMemoryDataSource } from './in-memory-data-source';

/** Every table the application writes, registered on one in-memory data source. */
export function createStore() {
  const dataSource = new InMemoryDataSource();
  return {
    dataSource,
    repositories: dataSource.register(RepositoryEntity, {
      primary: ['id'],
      generated: 'id',
      createDate: ['trackedSince'],
      defaults: { githubId: null, lastSyncedAt: null, syncCursor: null },
    }),
    events: dataSource.register(RawEventEntity, {
      primary: ['id'],
      generated: 'id',
      createDate: ['ingestedAt'],
    }),
    sessions: dataSource.register(ReviewSessionEntity, { primary: ['id'], generated: 'id' }),
    users: dataSource.register(UserEntity, { primary: ['login'] }),
    unlocks: dataSource.register(UserAchievementEntity, {
      primary: ['user', 'achievementId'],
      defaults: { notifiedAt: null },
    }),
    classifications: dataSource.register(CommentClassificationEntity, {
      primary: ['commentId'],
      createDate: ['classifiedAt'],
      defaults: { status: 'classified', attempts: 1, lastError: null },
    }),
    seasons: dataSource.register(SeasonEntity, { primary: ['number'] }),
    teams: dataSource.register(TeamEntity, {
      primary: ['id'],
      generated: 'id',
      createDate: ['createdAt'],
      defaults: { description: null, color: '#6366f1' },
    }),
    teamMembers: dataSource.register(TeamMemberEntity, { primary: ['teamId', 'login'], createDate: ['joinedAt'] }),
  };
}

export type Store = ReturnType<typeof createStore>;
