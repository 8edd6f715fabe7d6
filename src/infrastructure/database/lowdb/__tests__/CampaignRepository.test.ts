import { beforeEach, describe, expect, it } from 'vitest';
import { DatabaseConnection, IN_MEMORY_PATH } from '../connection.js';
import { CampaignRepository } from '../CampaignRepository.js';
import { PersistenceError } from '@/utils/errors.js';
import { campaign, enemy, pc } from '@/__tests__/support/fakes.js';

class FlakyConnection extends DatabaseConnection {
  failWrites = false;

  async write(): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    await super.write();
  }
}

describe('CampaignRepository', () => {
  let db: FlakyConnection;
  let repo: CampaignRepository;

  beforeEach(async () => {
    db = new FlakyConnection({ path: IN_MEMORY_PATH });
    await db.init();
    repo = new CampaignRepository(db);
  });

  it('saves and loads the whole aggregate', async () => {
    const aggregate = campaign([pc({ id: 'elara', name: 'Elara', statusNotes: 'Blessed' }), enemy({ id: 'goblin', name: 'Goblin' })], {
      activeCombat: {
        id: 'combat-1',
        isActive: true,
        roundNumber: 2,
        turnOrder: [{ id: 'elara', isDefeated: false, isSurprised: false }],
        currentTurnIndex: 0,
        surprisedEntities: [],
        defeated: [{ id: 'goblin', isDefeated: true, isSurprised: false }],
        startedAt: 500,
      },
      activePlayerChoices: ['Fight', 'Flee'],
      readAloudText: 'The torches gutter as the door groans open.',
      sceneImageUri: '/images/scenes/placeholder_3.png',
      narrativeLog: [{ id: 'log-1', timestamp: 400, entry: 'The party enters the crypt', importance: 'standard' }],
      recentRolls: [
        {
          id: 'roll-1',
          characterId: 'elara',
          characterName: 'Elara',
          checkType: 'Perception',
          result: 17,
          outcome: 'Success',
          timestamp: 450,
        },
      ],
      version: 7,
    });

    await repo.save(aggregate);

    expect(await repo.load('campaign-1')).toEqual(aggregate);
    expect(repo.getStats()).toEqual({ total: 1, inCombat: 1 });
  });

  it('returns null for unknown campaigns', async () => {
    expect(await repo.load('missing')).toBeNull();
  });

  it('updates in place', async () => {
    await repo.save(campaign([]));
    await repo.save(campaign([], { name: 'Renamed', version: 2 }));

    expect(repo.getStats()).toEqual({ total: 1, inCombat: 0 });
    expect(await repo.load('campaign-1')).toMatchObject({ name: 'Renamed', version: 2 });
  });

  it('restores the previous record when the write fails', async () => {
    await repo.save(campaign([pc({ id: 'elara', name: 'Elara', currentHp: 20 })]));

    db.failWrites = true;
    await expect(
      repo.save(campaign([pc({ id: 'elara', name: 'Elara', currentHp: 4 })], { version: 2 }))
    ).rejects.toBeInstanceOf(PersistenceError);

    const stored = await repo.load('campaign-1');
    expect(stored?.version).toBe(1);
    expect(stored?.roster[0]?.currentHp).toBe(20);
  });

  it('drops a new record when its first write fails', async () => {
    db.failWrites = true;
    await expect(repo.save(campaign([]))).rejects.toBeInstanceOf(PersistenceError);

    expect(await repo.load('campaign-1')).toBeNull();
    expect(repo.getStats().total).toBe(0);
  });

  it('reports corrupt columns as persistence failures', async () => {
    db.getData().campaigns.push({
      id: 'broken',
      name: 'Broken',
      roster: '{not json',
      active_combat: null,
      active_player_choices: '[]',
      version: 1,
      last_activity_at: new Date(0).toISOString(),
      created_at: new Date(0).toISOString(),
      updated_at: new Date(0).toISOString(),
    });

    await expect(repo.load('broken')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('fills narration columns missing from older records', async () => {
    db.getData().campaigns.push({
      id: 'legacy',
      name: 'Legacy',
      roster: '[]',
      active_combat: null,
      active_player_choices: '[]',
      version: 3,
      last_activity_at: new Date(0).toISOString(),
      created_at: new Date(0).toISOString(),
      updated_at: new Date(0).toISOString(),
    });

    expect(await repo.load('legacy')).toMatchObject({
      readAloudText: null,
      sceneImageUri: null,
      narrativeLog: [],
      recentRolls: [],
      version: 3,
    });
  });
});
