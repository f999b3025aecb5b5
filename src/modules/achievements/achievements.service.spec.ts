import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { createStore, Store } from '../../../test/store';
import { AchievementsService } from './achievements.service';
import { UserAchievementEntity } from './entities/user-achievement.entity';

const at = (iso: string) => new Date(iso);

describe('AchievementsService', () => {
  let store: Store;
  let service: AchievementsService;

  beforeEach(async () => {
    store = createStore();
    store.unlocks.seed([
      { user: 'bob', achievementId: 'review_10', unlockedAt: at('2026-03-04T09:00:00Z') },
      { user: 'bob', achievementId: 'first_review', unlockedAt: at('2026-03-02T10:33:00Z') },
      {
        user: 'carol',
        achievementId: 'first_review',
        unlockedAt: at('2026-03-02T15:01:00Z'),
        notifiedAt: at('2026-03-02T16:00:00Z'),
      },
      { user: 'carol', achievementId: 'retired_badge', unlockedAt: at('2026-03-01T00:00:00Z') },
    ]);
    const moduleRef = await Test.createTestingModule({
      providers: [
        AchievementsService,
        { provide: getRepositoryToken(UserAchievementEntity), useValue: store.unlocks },
      ],
    }).compile();
    service = moduleRef.get(AchievementsService);
  });

  it('lists the unlocks of one user oldest first with their catalog entries', async () => {
    const unlocked = await service.forUser('bob');

    expect(unlocked.map((u) => [u.achievement.id, u.achievement.name])).toEqual([
      ['first_review', 'First Blood'],
      ['review_10', 'Getting Started'],
    ]);
  });

  it('returns only unannounced unlocks that are still in the catalog', async () => {
    const pending = await service.pending();

    expect(pending.map((u) => `${u.user}:${u.achievement.id}`)).toEqual(['bob:first_review', 'bob:review_10']);
  });

  it('marks unlocks as notified once', async () => {
    const first = await service.markNotified('bob', ['first_review', 'speed_demon']);
    const second = await service.markNotified('bob', ['first_review']);

    expect(first).toEqual({ updated: 1 });
    expect(second).toEqual({ updated: 0 });
    expect((await service.pending()).map((u) => u.achievement.id)).toEqual(['review_10']);
  });

  it('only marks unlocks of the given user', async () => {
    await service.markNotified('carol', ['review_10']);

    expect((await service.pending()).map((u) => u.user)).toEqual(['bob', 'bob']);
  });
});
