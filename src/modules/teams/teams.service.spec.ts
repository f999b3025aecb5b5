import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { createStore, Store } from '../../../test/store';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { ReviewSessionEntity } from '../sessions/entities/review-session.entity';
import { SessionsService } from '../sessions/sessions.service';
import { UserEntity } from '../users/entities/user.entity';
import { TeamMemberEntity } from './entities/team-member.entity';
import { TeamEntity } from './entities/team.entity';
import { TeamsService } from './teams.service';

const DAY = 24 * 60 * 60 * 1000;

describe('TeamsService', () => {
  let store: Store;
  let service: TeamsService;

  const session = (reviewer: string, repositoryId: number, daysAgo: number, xpEarned: number) => {
    const windowStart = new Date(Date.now() - daysAgo * DAY);
    return { repositoryId, pullRequest: 1, reviewer, windowStart, windowEnd: windowStart, xpEarned };
  };

  beforeEach(async () => {
    store = createStore();
    store.repositories.seed([
      { owner: 'octo-org', name: 'api', fullName: 'octo-org/api' },
      { owner: 'octo-org', name: 'web', fullName: 'octo-org/web' },
    ]);
    store.sessions.seed([
      session('bob', 1, 1, 40),
      session('carol', 2, 2, 30),
      session('dave', 1, 3, 25),
      session('dave', 1, 4, 25),
      session('erin', 1, 60, 300),
    ]);
    store.users.seed([
      { login: 'bob', xp: 40, level: 1 },
      { login: 'erin', xp: 300, level: 2 },
    ]);

    const moduleRef = await Test.createTestingModule({
      providers: [
        TeamsService,
        SessionsService,
        { provide: DataSource, useValue: store.dataSource },
        { provide: getRepositoryToken(TeamEntity), useValue: store.teams },
        { provide: getRepositoryToken(TeamMemberEntity), useValue: store.teamMembers },
        { provide: getRepositoryToken(UserEntity), useValue: store.users },
        { provide: getRepositoryToken(ReviewSessionEntity), useValue: store.sessions },
        { provide: getRepositoryToken(RepositoryEntity), useValue: store.repositories },
      ],
    }).compile();
    service = moduleRef.get(TeamsService);
  });

  it('creates teams with the default color and refuses duplicate names', async () => {
    const team = await service.create({ name: 'platform' });

    expect(team).toMatchObject({ id: 1, name: 'platform', description: null, color: '#6366f1' });
    expect(team.createdAt).toBeInstanceOf(Date);
    await expect(service.create({ name: 'platform', color: '#000000' })).rejects.toBeInstanceOf(
      ConflictException,
    );
  });

  it('lists members by all-time XP and adds each login once', async () => {
    await service.create({ name: 'platform', description: 'Build tooling' });
    await service.addMember('platform', 'bob');
    await service.addMember('platform', 'erin');
    await service.addMember('platform', 'zoe');
    await service.addMember('platform', 'bob');

    const details = await service.get('platform');

    expect(details.description).toBe('Build tooling');
    expect(details.members).toEqual([
      { login: 'erin', xp: 300, level: 2 },
      { login: 'bob', xp: 40, level: 1 },
      { login: 'zoe', xp: 0, level: 1 },
    ]);
    expect(store.teamMembers.all()).toHaveLength(3);
  });

  it('removes members and reports logins that were not members', async () => {
    await service.create({ name: 'platform' });
    await service.addMember('platform', 'bob');

    await service.removeMember('platform', 'bob');

    expect((await service.get('platform')).members).toEqual([]);
    await expect(service.removeMember('platform', 'bob')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('deletes a team together with its memberships', async () => {
    await service.create({ name: 'platform' });
    await service.create({ name: 'web' });
    await service.addMember('platform', 'bob');
    await service.addMember('web', 'carol');

    await service.remove('platform');

    expect((await service.findAll()).map((t) => t.name)).toEqual(['web']);
    expect(store.teamMembers.all().map((m) => m.login)).toEqual(['carol']);
    await expect(service.get('platform')).rejects.toBeInstanceOf(NotFoundException);
  });

  describe('getLeaderboard', () => {
    beforeEach(async () => {
      await service.create({ name: 'platform' });
      await service.create({ name: 'web' });
      await service.create({ name: 'empty' });
      await service.addMember('platform', 'bob');
      await service.addMember('platform', 'erin');
      await service.addMember('web', 'carol');
      await service.addMember('web', 'dave');
    });

    it('sums member XP inside the window and leaves out teams without members', async () => {
      const board = await service.getLeaderboard(undefined, 'week', 10);

      expect(board.map((e) => [e.rank, e.team.name, e.xp, e.sessions, e.memberCount])).toEqual([
        [1, 'web', 80, 3, 2],
        [2, 'platform', 40, 1, 2],
      ]);
    });

    it('counts all-time XP and filters by repository', async () => {
      const allTime = await service.getLeaderboard(undefined, 'all', 10);
      const api = await service.getLeaderboard('octo-org/api', 'week', 1);

      expect(allTime.map((e) => [e.team.name, e.xp])).toEqual([
        ['platform', 340],
        ['web', 80],
      ]);
      expect(api.map((e) => [e.team.name, e.xp])).toEqual([['web', 50]]);
    });
  });
});
