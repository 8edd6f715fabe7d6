import { beforeEach, describe, expect, it } from 'vitest';
import { createCampaignServices, type CampaignServices } from '@/application/createCampaignServices.js';
import type { CombatantInfo } from '@/domain/combat/types.js';
import { InvalidStateError, NotFoundError, PersistenceError, ValidationError } from '@/utils/errors.js';
import { METRICS, metrics } from '@/utils/metrics.js';
import { InMemoryCampaignStore, RecordingSink, campaign, enemy, pc } from '@/__tests__/support/fakes.js';

const CAMPAIGN = 'campaign-1';

const elaraInfo: CombatantInfo = { id: 'elara', name: 'Elara', type: 'PC', initiative: 18, currentHp: 3, maxHp: 20 };
const thorinInfo: CombatantInfo = { id: 'thorin', name: 'Thorin', type: 'PC', initiative: 15, currentHp: 30, maxHp: 30 };
const goblinInfo: CombatantInfo = { id: 'goblin', name: 'Goblin', type: 'Enemy', initiative: 12, currentHp: 2, maxHp: 7 };

describe('CombatCoordinator', () => {
  let store: InMemoryCampaignStore;
  let sink: RecordingSink;
  let services: CampaignServices;

  beforeEach(() => {
    metrics.reset();
    store = new InMemoryCampaignStore();
    sink = new RecordingSink();
    store.seed(
      campaign([
        pc({ id: 'elara', name: 'Elara', maxHp: 20, currentHp: 3 }),
        pc({ id: 'thorin', name: 'Thorin', maxHp: 30, currentHp: 30 }),
      ])
    );
    services = createCampaignServices(store, sink);
  });

  async function startDefaultCombat(extra: CombatantInfo[] = [goblinInfo]) {
    return services.coordinator.startCombat(CAMPAIGN, [elaraInfo, thorinInfo, ...extra]);
  }

  describe('startCombat', () => {
    it('builds the turn order by initiative', async () => {
      const { result, event } = await services.coordinator.startCombat(CAMPAIGN, [thorinInfo, elaraInfo]);

      expect(result.turnOrder.map((c) => c.name)).toEqual(['Elara', 'Thorin']);
      expect(result.currentTurnIndex).toBe(0);
      expect(result.roundNumber).toBe(1);
      expect(event.name).toBe('CombatStarted');
      expect(event.sequence).toBe(2);
    });

    it('takes the rolled initiative and enlists unknown enemies', async () => {
      await startDefaultCombat();

      const state = await services.coordinator.getState(CAMPAIGN);
      const goblin = state.characters.find((c) => c.id === 'goblin');
      expect(goblin).toMatchObject({ type: 'Enemy', currentHp: 2, maxHp: 7, initiative: 12 });
      expect(state.characters.find((c) => c.id === 'elara')?.initiative).toBe(18);
    });

    it('rejects an empty list, a second combat and unknown player characters', async () => {
      await expect(services.coordinator.startCombat(CAMPAIGN, [])).rejects.toBeInstanceOf(ValidationError);
      await expect(
        services.coordinator.startCombat(CAMPAIGN, [{ ...elaraInfo, id: 'ghost', name: 'Ghost' }])
      ).rejects.toBeInstanceOf(NotFoundError);

      await startDefaultCombat();
      await expect(startDefaultCombat()).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('takes the supplied hit points for an enemy already on the roster', async () => {
      store.seed(
        campaign([
          pc({ id: 'elara', name: 'Elara', maxHp: 20, currentHp: 3 }),
          pc({ id: 'thorin', name: 'Thorin', maxHp: 30, currentHp: 30 }),
          enemy({ id: 'goblin', name: 'Goblin', currentHp: 0 }),
        ])
      );

      const { result } = await startDefaultCombat([{ ...goblinInfo, currentHp: 7 }]);

      const goblin = result.turnOrder.find((c) => c.id === 'goblin');
      expect(goblin).toMatchObject({ currentHp: 7, maxHp: 7, isDefeated: false, status: 'none' });
      expect(result.turnOrder.find((c) => c.id === 'thorin')?.currentHp).toBe(30);
    });

    it('refuses an enemy that arrives already at 0 hp', async () => {
      const rat: CombatantInfo = { id: 'rat', name: 'Rat', type: 'Enemy', initiative: 3, currentHp: 0, maxHp: 2 };

      await expect(startDefaultCombat([goblinInfo, rat])).rejects.toBeInstanceOf(InvalidStateError);
      expect(store.saves).toBe(0);
      expect((await services.coordinator.getState(CAMPAIGN)).combat).toBeNull();
    });

    it('fails for a campaign that does not exist', async () => {
      await expect(services.coordinator.startCombat('nope', [elaraInfo])).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('advanceTurn', () => {
    it('wraps to the next round', async () => {
      await services.coordinator.startCombat(CAMPAIGN, [elaraInfo, thorinInfo]);

      const first = await services.coordinator.advanceTurn(CAMPAIGN);
      const second = await services.coordinator.advanceTurn(CAMPAIGN);

      expect(first.event.name).toBe('TurnAdvanced');
      expect(second.event.name).toBe('RoundAdvanced');
      expect(second.result.roundNumber).toBe(2);
      expect(second.result.currentTurnIndex).toBe(0);
      expect(second.result.currentCombatantId).toBe('elara');
    });

    it('needs an active combat', async () => {
      await expect(services.coordinator.advanceTurn(CAMPAIGN)).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('setInitiative', () => {
    it('re-sorts and keeps the current turn', async () => {
      await startDefaultCombat();
      await services.coordinator.advanceTurn(CAMPAIGN);

      const { result, event } = await services.coordinator.setInitiative(CAMPAIGN, 'Goblin', 25);

      expect(event.name).toBe('InitiativeSet');
      expect(result.turnOrder.map((c) => c.id)).toEqual(['goblin', 'elara', 'thorin']);
      expect(result.currentCombatantId).toBe('thorin');
      expect(result.currentTurnIndex).toBe(2);
    });

    it('rejects combatants outside the turn order', async () => {
      await services.coordinator.startCombat(CAMPAIGN, [elaraInfo]);
      await expect(services.coordinator.setInitiative(CAMPAIGN, 'thorin', 3)).rejects.toBeInstanceOf(
        InvalidStateError
      );
    });
  });

  describe('updateCharacterState', () => {
    it('knocks a PC unconscious at 0 hp', async () => {
      const { result, event } = await services.coordinator.updateCharacterState(CAMPAIGN, 'Elara', {
        key: 'current_hp',
        value: 0,
      });

      expect(result.character.conditions).toEqual(['Unconscious']);
      expect(result.character.deathSaveSuccesses).toBe(0);
      expect(result.character.deathSaveFailures).toBe(0);
      expect(result.status).toBe('Unconscious');
      expect(event.name).toBe('CharacterStateUpdated');
    });

    it('three failed saves kill', async () => {
      await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'current_hp', value: 0 });
      for (let i = 0; i < 3; i++) {
        await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'death_save_failure', value: 1 });
      }

      const elara = (await services.coordinator.getState(CAMPAIGN)).characters.find((c) => c.id === 'elara');
      expect(elara?.deathSaveFailures).toBe(3);
      expect(elara?.conditions).toEqual(['Dead']);
      expect(elara?.status).toBe('Dead');
    });

    it('stabilize goes straight to three successes', async () => {
      await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'current_hp', value: 0 });
      await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'death_save_success', value: 1 });
      await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'death_save_failure', value: 2 });

      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'stabilize' });

      expect(result.character.deathSaveSuccesses).toBe(3);
      expect(result.character.deathSaveFailures).toBe(2);
      expect(result.character.conditions).toEqual(['Stable']);
    });

    it('keeps the combat view equal to the roster', async () => {
      await startDefaultCombat();

      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'thorin', {
        key: 'damage',
        value: 12,
      });

      expect(result.character.currentHp).toBe(18);
      expect(result.combat?.turnOrder.find((c) => c.id === 'thorin')?.currentHp).toBe(18);

      const state = await services.coordinator.getState(CAMPAIGN);
      for (const combatant of state.combat?.turnOrder ?? []) {
        const character = state.characters.find((c) => c.id === combatant.id);
        expect(combatant.currentHp).toBe(character?.currentHp);
      }
    });

    it('ends combat when the last enemy drops to 0 hp', async () => {
      await startDefaultCombat();

      const { result, event } = await services.coordinator.updateCharacterState(CAMPAIGN, 'goblin', {
        key: 'current_hp',
        value: 0,
      });

      expect(result.combatEnded).toBe(true);
      expect(result.status).toBe('Defeated');
      expect(event.name).toBe('CombatEnded');
      expect(event.payload).toMatchObject({ reason: 'all_enemies_defeated', combat: null });
      expect((await services.coordinator.getState(CAMPAIGN)).combat).toBeNull();
    });

    it('keeps a downed PC in the turn order', async () => {
      await startDefaultCombat();

      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'elara', {
        key: 'current_hp',
        value: 0,
      });

      const projection = result.combat?.turnOrder.find((c) => c.id === 'elara');
      expect(projection?.status).toBe('Unconscious');
      expect(projection?.isDefeated).toBe(false);
      expect(result.combatEnded).toBe(false);
    });

    it('re-sorts the turn order on an initiative update', async () => {
      await startDefaultCombat();

      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'thorin', {
        key: 'initiative',
        value: 30,
      });

      expect(result.combat?.turnOrder.map((c) => c.id)).toEqual(['thorin', 'elara', 'goblin']);
      expect(result.combat?.currentCombatantId).toBe('elara');
    });

    it('sets status notes', async () => {
      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'thorin', {
        key: 'status_notes',
        value: 'Carrying the lantern',
      });
      expect(result.character.statusNotes).toBe('Carrying the lantern');
    });
  });

  describe('markDefeated', () => {
    it('ends combat after the only enemy is defeated', async () => {
      await startDefaultCombat();

      const { result, event } = await services.coordinator.markDefeated(CAMPAIGN, 'goblin');

      expect(result.combatEnded).toBe(true);
      expect(result.character.currentHp).toBe(0);
      expect(event.name).toBe('CombatEnded');
      expect((await services.coordinator.getState(CAMPAIGN)).combat).toBeNull();
    });

    it('keeps combat going while another enemy stands', async () => {
      await startDefaultCombat([goblinInfo, { ...goblinInfo, id: 'orc', name: 'Orc', initiative: 5 }]);

      const { result, event } = await services.coordinator.markDefeated(CAMPAIGN, 'goblin');

      expect(result.combatEnded).toBe(false);
      expect(event.name).toBe('CombatStateUpdated');
      expect(result.combat?.turnOrder.map((c) => c.id)).toEqual(['elara', 'thorin', 'orc']);
      expect(result.combat?.defeated.map((c) => [c.id, c.status])).toEqual([['goblin', 'Defeated']]);
    });

    it('never defeats a player character', async () => {
      await startDefaultCombat();
      await expect(services.coordinator.markDefeated(CAMPAIGN, 'elara')).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('addCombatant and removeCombatant', () => {
    it('adds reinforcements and removes a fleeing combatant', async () => {
      await startDefaultCombat();

      const added = await services.coordinator.addCombatant(CAMPAIGN, {
        id: 'wolf',
        name: 'Wolf',
        type: 'Enemy',
        initiative: 16,
        currentHp: 11,
        maxHp: 11,
      });
      expect(added.result.turnOrder.map((c) => c.id)).toEqual(['elara', 'wolf', 'thorin', 'goblin']);

      const removed = await services.coordinator.removeCombatant(CAMPAIGN, 'Goblin');
      expect(removed.result.turnOrder.map((c) => c.id)).toEqual(['elara', 'wolf', 'thorin']);
      expect(removed.result.isActive).toBe(true);
    });

    it('refuses reinforcements at 0 hp', async () => {
      await startDefaultCombat();

      await expect(
        services.coordinator.addCombatant(CAMPAIGN, {
          id: 'rat',
          name: 'Rat',
          type: 'Enemy',
          initiative: 3,
          currentHp: 0,
          maxHp: 2,
        })
      ).rejects.toBeInstanceOf(InvalidStateError);
      const state = await services.coordinator.getState(CAMPAIGN);
      expect(state.combat?.turnOrder.map((c) => c.id)).toEqual(['elara', 'thorin', 'goblin']);
      expect(state.characters.map((c) => c.id)).toEqual(['elara', 'thorin', 'goblin']);
    });

    it('passes the turn to the next combatant when the current one leaves', async () => {
      await startDefaultCombat([goblinInfo, { ...goblinInfo, id: 'orc', name: 'Orc', initiative: 5 }]);
      await services.coordinator.advanceTurn(CAMPAIGN);

      const removed = await services.coordinator.removeCombatant(CAMPAIGN, 'thorin');
      expect(removed.result.turnOrder.map((c) => c.id)).toEqual(['elara', 'goblin', 'orc']);
      expect(removed.result.currentTurnIndex).toBe(1);
      expect(removed.result.currentCombatantId).toBe('goblin');

      const defeated = await services.coordinator.markDefeated(CAMPAIGN, 'goblin');
      expect(defeated.result.combat?.currentTurnIndex).toBe(1);
      expect(defeated.result.combat?.currentCombatantId).toBe('orc');
    });
  });

  describe('endCombat', () => {
    it('clears the encounter', async () => {
      await startDefaultCombat();

      const { event } = await services.coordinator.endCombat(CAMPAIGN);

      expect(event.name).toBe('CombatEnded');
      expect(event.payload).toMatchObject({ reason: 'manual', combat: null });
      await expect(services.coordinator.endCombat(CAMPAIGN)).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('character resolution', () => {
    it('fails on unknown and ambiguous names without writing', async () => {
      store.seed(
        campaign([
          enemy({ id: 'guard-1', name: 'Guard' }),
          enemy({ id: 'guard-2', name: 'Guard' }),
        ])
      );

      await expect(
        services.coordinator.updateCharacterState(CAMPAIGN, 'Guard', { key: 'current_hp', value: 1 })
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        services.coordinator.updateCharacterState(CAMPAIGN, 'Nobody', { key: 'current_hp', value: 1 })
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(store.saves).toBe(0);

      const { result } = await services.coordinator.updateCharacterState(CAMPAIGN, 'guard-2', {
        key: 'current_hp',
        value: 1,
      });
      expect(result.character.id).toBe('guard-2');
    });
  });

  describe('atomicity', () => {
    it('a failed save leaves state untouched and emits nothing', async () => {
      store.failNextSave = new Error('disk full');

      await expect(
        services.coordinator.updateCharacterState(CAMPAIGN, 'elara', { key: 'current_hp', value: 0 })
      ).rejects.toBeInstanceOf(PersistenceError);
      await services.router.flush();

      const state = await services.coordinator.getState(CAMPAIGN);
      expect(state.version).toBe(1);
      expect(state.characters.find((c) => c.id === 'elara')?.currentHp).toBe(3);
      expect(sink.published).toEqual([]);
      expect(metrics.getCounter(METRICS.MUTATION_FAILED)).toBe(1);
    });

    it('a rejected change writes nothing', async () => {
      await expect(
        services.coordinator.updateCharacterState(CAMPAIGN, 'thorin', { key: 'death_save_failure', value: 1 })
      ).rejects.toBeInstanceOf(InvalidStateError);

      expect(store.saves).toBe(0);
      expect((await services.coordinator.getState(CAMPAIGN)).version).toBe(1);
    });
  });

  describe('serialization', () => {
    it('applies concurrent mutations one at a time, in call order', async () => {
      const calls = Array.from({ length: 5 }, () =>
        services.coordinator.updateCharacterState(CAMPAIGN, 'thorin', { key: 'damage', value: 1 })
      );
      const outcomes = await Promise.all(calls);
      await services.router.flush();

      expect(outcomes.map((o) => o.event.sequence)).toEqual([2, 3, 4, 5, 6]);
      expect(outcomes.map((o) => o.result.character.currentHp)).toEqual([29, 28, 27, 26, 25]);
      expect(sink.published.map((p) => p.message.sequence)).toEqual([2, 3, 4, 5, 6]);
      expect(metrics.getCounter(METRICS.MUTATION_COMMITTED)).toBe(5);
    });
  });
});
