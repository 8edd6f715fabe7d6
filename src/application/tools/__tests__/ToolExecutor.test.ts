import { beforeEach, describe, expect, it } from 'vitest';
import { createCampaignServices, type CampaignServices } from '@/application/createCampaignServices.js';
import { TOOL_NAMES, isToolName } from '../ToolExecutor.js';
import { InMemoryCampaignStore, RecordingSink, campaign, pc } from '@/__tests__/support/fakes.js';

const CAMPAIGN = 'campaign-1';

describe('ToolExecutor', () => {
  let store: InMemoryCampaignStore;
  let sink: RecordingSink;
  let services: CampaignServices;

  beforeEach(() => {
    store = new InMemoryCampaignStore();
    sink = new RecordingSink();
    store.seed(campaign([pc({ id: 'elara', name: 'Elara', maxHp: 20, currentHp: 20 })]));
    services = createCampaignServices(store, sink);
  });

  it('knows its tools', () => {
    expect(TOOL_NAMES).toHaveLength(18);
    expect(isToolName('advance_turn')).toBe(true);
    expect(isToolName('cast_fireball')).toBe(false);
  });

  it('rejects unknown tools', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'cast_fireball', {});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('UNKNOWN_TOOL');
      expect(result.error.details?.validTools).toEqual([...TOOL_NAMES]);
    }
  });

  it('reports bad arguments as validation errors', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'set_initiative', { character_id: 'elara', value: 'high' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe('Invalid arguments for set_initiative');
    }
    expect(store.saves).toBe(0);
  });

  it('returns state changes with the emitted event and its audiences', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'update_character_state', {
      character_id: 'Elara',
      key: 'damage',
      value: 5,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.events).toEqual([{ name: 'CharacterStateUpdated', sequence: 2, audiences: ['all'] }]);
      expect(result.data).toMatchObject({ character: { id: 'elara', currentHp: 15 }, status: 'Alive' });
    }
  });

  it('counts a death save when no value is given', async () => {
    await services.tools.execute(CAMPAIGN, 'update_character_state', {
      character_id: 'elara',
      key: 'current_hp',
      value: 0,
    });
    const result = await services.tools.execute(CAMPAIGN, 'update_character_state', {
      character_id: 'elara',
      key: 'death_save_failure',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toMatchObject({ character: { deathSaveFailures: 1 }, status: 'Unconscious' });
    }
  });

  it('maps domain errors to their codes', async () => {
    const notFound = await services.tools.execute(CAMPAIGN, 'mark_defeated', { character_id: 'nobody' });
    const invalid = await services.tools.execute(CAMPAIGN, 'advance_turn');
    const missing = await services.tools.execute('missing', 'get_game_state');

    expect(notFound.success ? null : notFound.error.code).toBe('NOT_FOUND');
    expect(invalid.success ? null : invalid.error.code).toBe('INVALID_STATE');
    expect(missing.success ? null : missing.error.code).toBe('NOT_FOUND');
  });

  it('runs a whole encounter through tool calls', async () => {
    const start = await services.tools.execute(CAMPAIGN, 'start_combat', {
      combatants: [
        { id: 'elara', name: 'Elara', type: 'PC', initiative: 14, currentHp: 20, maxHp: 20 },
        { id: 'bandit', name: 'Bandit', type: 'Enemy', initiative: 9, currentHp: 11, maxHp: 11 },
      ],
    });
    expect(start.success).toBe(true);

    const turn = await services.tools.execute(CAMPAIGN, 'advance_turn', {});
    expect(turn.success && turn.events[0]?.name).toBe('TurnAdvanced');

    const hit = await services.tools.execute(CAMPAIGN, 'update_character_state', {
      character_id: 'Bandit',
      key: 'damage',
      value: 11,
    });
    expect(hit.success && hit.events[0]?.name).toBe('CombatEnded');

    const state = await services.tools.execute(CAMPAIGN, 'get_game_state');
    expect(state.success && state.events).toEqual([]);
    expect(state.success ? state.data : null).toMatchObject({ version: 4, combat: null });
  });

  it('routes narrative cues to player screens only', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'narrative_anchor', {
      short_text: 'The bridge groans',
      mood_category: 'Danger',
    });
    await services.router.flush();

    expect(result.success && result.events).toEqual([
      { name: 'NarrativeAnchorUpdated', sequence: 2, audiences: ['players'] },
    ]);
    expect(sink.published.map((p) => [p.audience, p.eventName])).toEqual([['players', 'NarrativeAnchorUpdated']]);
    expect(sink.published[0]?.message.payload).toEqual({ shortText: 'The bridge groans', moodCategory: 'Danger' });
  });

  it('keeps read-aloud text on the DM screen', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'display_read_aloud_text', {
      text: 'The door groans open onto a flooded hall.',
    });
    await services.router.flush();

    expect(result.success && result.events).toEqual([
      { name: 'ReadAloudTextReceived', sequence: 2, audiences: ['dm'] },
    ]);
    expect(sink.published.map((p) => [p.audience, p.eventName])).toEqual([['dm', 'ReadAloudTextReceived']]);
    expect((await services.coordinator.getState(CAMPAIGN)).readAloudText).toBe(
      'The door groans open onto a flooded hall.'
    );
  });

  it('logs game events for the DM with standard importance by default', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'update_game_log', { entry: 'Elara pockets the key' });
    await services.router.flush();

    expect(result.success && result.events).toEqual([{ name: 'GameLogUpdated', sequence: 2, audiences: ['dm'] }]);
    expect(result.success ? result.data : null).toMatchObject({ entry: 'Elara pockets the key', importance: 'standard' });
    expect(sink.published.map((p) => p.audience)).toEqual(['dm']);
  });

  it('rejects unknown log importance', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'update_game_log', { entry: 'x', importance: 'huge' });
    expect(result.success ? null : result.error.code).toBe('VALIDATION_ERROR');
  });

  it('shares logged rolls with every screen', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'log_player_roll', {
      character_id: 'Elara',
      check_type: 'Stealth',
      result: 14,
      outcome: 'Success',
    });
    await services.router.flush();

    expect(result.success && result.events).toEqual([{ name: 'PlayerRollLogged', sequence: 2, audiences: ['all'] }]);
    expect(sink.published.map((p) => [p.audience, p.eventName])).toEqual([['all', 'PlayerRollLogged']]);
    expect(sink.published[0]?.message.payload).toMatchObject({
      characterId: 'elara',
      characterName: 'Elara',
      checkType: 'Stealth',
      result: 14,
      outcome: 'Success',
    });
  });

  it('shares scene images with every screen', async () => {
    const result = await services.tools.execute(CAMPAIGN, 'update_scene_image', { description: 'a' });
    await services.router.flush();

    expect(result.success && result.events).toEqual([{ name: 'SceneImageUpdated', sequence: 2, audiences: ['all'] }]);
    expect(result.success ? result.data : null).toEqual({
      imageUri: '/images/scenes/placeholder_4.png',
      description: 'a',
    });
    expect(sink.published.map((p) => p.audience)).toEqual(['all']);
  });
});
