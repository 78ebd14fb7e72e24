import { describe, it, expect } from 'vitest';
import { repeat, startTestSession, walk } from '../helpers/fixtures.js';

// Sage stands at (4,3); (3,2) is diagonal to it
const TO_SAGE = ['right', 'right', 'down'] as const;

describe('GameSession', () => {
  describe('start', () => {
    it('places the player on the authored spawn of floor 1', () => {
      const view = startTestSession().view();

      expect(view.floor).toBe(1);
      expect(view.maxFloors).toBe(2);
      expect(view.status).toBe('playing');
      expect(view.floorComplete).toBe(false);
      expect(view.player).toEqual({
        x: 1,
        y: 1,
        coherence: 80,
        maxCoherence: 100,
        knowledge: [],
        questionsAnswered: 0,
        questionsCorrect: 0,
        questionsWrong: 0,
        npcsDefeated: 0,
      });
      expect(view.map[0]).toBe('############');
      expect(view.map[1]).toBe('#..........#');
      expect(view.conversation).toBeNull();
      expect(view.warnings).toEqual([]);
    });

    it('lists stairs, terminals, NPCs and the player', () => {
      const entities = startTestSession().view().entities;

      expect(entities.map((entity) => entity.id)).toEqual([
        'stairs-down-1',
        'term-1',
        'spec-s',
        'helper-h',
        'player',
      ]);
      expect(entities[0]).toEqual({
        id: 'stairs-down-1',
        kind: 'stairs',
        name: 'Stairs down',
        glyph: '>',
        color: 'yellow',
        x: 10,
        y: 6,
      });
      expect(entities[2]).toEqual({
        id: 'spec-s',
        kind: 'npc',
        name: 'Sage',
        glyph: 'S',
        color: 'white',
        x: 4,
        y: 3,
        npcType: 'specialist',
      });
    });
  });

  describe('move', () => {
    it('rejects walls, diagonals and occupied cells without changing state', () => {
      const session = startTestSession();

      expect(session.move('up')).toMatchObject({ ok: false, kind: 'rejected', message: 'A wall blocks the way.' });
      expect(session.move(1, 1).message).toBe('You can only step one cell up, down, left or right.');
      expect(session.move(0, 0).ok).toBe(false);

      walk(session, ['right', 'right', 'down', 'down']);
      const blocked = session.move('right');
      expect(blocked).toMatchObject({ ok: false, kind: 'rejected', message: 'Sage is in the way.' });
      expect(session.view().player).toMatchObject({ x: 3, y: 3 });
    });

    it('accepts delta form and reports the new position', () => {
      const session = startTestSession();
      const result = session.move(1, 0);

      expect(result).toEqual({
        ok: true,
        kind: 'moved',
        message: 'You move.',
        warnings: [],
        payload: { position: { x: 2, y: 1 } },
      });
    });
  });

  describe('interact', () => {
    it('rejects when nothing is in reach', () => {
      const result = startTestSession().interact();
      expect(result).toMatchObject({ ok: false, kind: 'rejected', message: 'There is nothing here to interact with.' });
    });

    it('reads a nearby terminal and clears it on the next move', () => {
      const session = startTestSession();
      walk(session, [...repeat('right' as const, 6), 'down', 'down']);

      const result = session.interact();
      expect(result.kind).toBe('terminal');
      expect(result.message).toBe('Notice');
      expect(result.payload?.terminal).toEqual({ title: 'Notice', lines: ['Line one', 'Line two'] });
      expect(session.view().terminal).toEqual({ title: 'Notice', lines: ['Line one', 'Line two'] });

      walk(session, ['left']);
      expect(session.view().terminal).toBeNull();
    });

    it('lets a helper restore coherence once', () => {
      const session = startTestSession();
      walk(session, ['down', 'down', 'down', 'down']);

      const first = session.interact();
      expect(first).toMatchObject({ ok: true, kind: 'npc_restored', message: 'Healer restores 15 coherence.' });
      expect(first.payload?.coherenceDelta).toBe(15);
      expect(session.view().player.coherence).toBe(95);
      expect(session.view().lastResponse).toBe('Rest a moment.');

      const second = session.interact();
      expect(second).toMatchObject({ ok: true, kind: 'npc_idle', message: 'Healer has nothing more to share.' });
      expect(session.view().player.coherence).toBe(95);
      expect(session.view().player.npcsDefeated).toBe(0);
      expect(session.save().npc_history['helper-h']).toEqual({
        defeated: true,
        opinion: 0,
        encounters: 2,
        restored: true,
      });
    });

    it('ends the game when a helper drains the last coherence', () => {
      const session = startTestSession({ helperRestoreAmount: -80 });
      walk(session, ['down', 'down', 'down', 'down']);

      const result = session.interact();
      expect(result).toMatchObject({
        ok: true,
        kind: 'defeat',
        message: 'Healer drains you. Your coherence collapses.',
      });
      expect(result.payload?.coherenceDelta).toBe(-80);
      expect(result.payload?.stats).toMatchObject({ coherence: 0, score: 0 });
      expect(session.view().status).toBe('defeat');
      expect(session.move('up').kind).toBe('game_over');
    });

    it('keeps the way down sealed until required NPCs are convinced', () => {
      const session = startTestSession();
      walk(session, [...repeat('right' as const, 9), ...repeat('down' as const, 5)]);

      const result = session.interact();
      expect(result).toEqual({
        ok: false,
        kind: 'blocked',
        message: 'The way down is sealed. Still to convince: Sage.',
        warnings: [],
        payload: { outstanding: ['Sage'] },
      });
      expect(session.view().floor).toBe(1);
    });
  });

  describe('conversation', () => {
    it('starts with the first authored question when order is fixed', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);

      const result = session.interact();
      expect(result).toEqual({
        ok: true,
        kind: 'conversation_started',
        message: 'Answer me three.',
        warnings: [],
        payload: {
          npcId: 'spec-s',
          question: {
            id: 'q-mc-1',
            text: 'Pick two.',
            kind: 'multiple_choice',
            answers: ['One', 'Two', 'Three'],
            number: 1,
            total: 3,
          },
        },
      });
      expect(session.view().conversation).toMatchObject({
        npcId: 'spec-s',
        npcName: 'Sage',
        status: 'in_progress',
        correctCount: 0,
      });
    });

    it('blocks movement until the conversation is left, then resumes or restarts', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();

      expect(session.move('left').message).toBe('Finish or leave the conversation first.');

      const resumed = session.interact();
      expect(resumed.kind).toBe('conversation_resumed');
      expect(resumed.payload?.question?.id).toBe('q-mc-1');

      session.answer(1);
      const exited = session.exitConversation();
      expect(exited).toMatchObject({ ok: true, kind: 'conversation_exited', message: 'You step away from Sage.' });
      expect(session.view().conversation).toBeNull();

      // A new conversation starts over from the first question
      const restarted = session.interact();
      expect(restarted.kind).toBe('conversation_started');
      expect(restarted.payload?.question).toMatchObject({ id: 'q-mc-1', number: 1 });
    });

    it('rejects unusable answers without touching coherence', () => {
      const session = startTestSession();
      expect(session.answer(0).message).toBe('You are not in a conversation.');
      expect(session.exitConversation().message).toBe('You are not in a conversation.');

      walk(session, [...TO_SAGE]);
      session.interact();

      expect(session.answer('7')).toMatchObject({ ok: false, kind: 'rejected', message: 'Choose an answer between 1 and 3' });
      expect(session.answer('purple').message).toBe('Choose one of the 3 listed answers');
      expect(session.view().player.coherence).toBe(80);
      expect(session.view().conversation?.question?.id).toBe('q-mc-1');
    });

    it('matches multiple-choice answers by text', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();

      const result = session.answer('two');
      expect(result.payload?.isCorrect).toBe(true);
      expect(result.message).toBe('Yes, two.');
    });

    it('costs 30 coherence and one opinion point for a wrong answer', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();

      const result = session.answer(0);
      expect(result).toMatchObject({ ok: true, kind: 'answered', message: 'No, one.' });
      expect(result.payload).toMatchObject({ isCorrect: false, coherenceDelta: -30, conversationCompleted: false });
      expect(session.view().player.coherence).toBe(50);
      expect(session.save().npc_history['spec-s']).toEqual({
        defeated: false,
        opinion: -1,
        encounters: 1,
        restored: false,
      });
    });

    it('draws the same question order for the same seed when shuffling', () => {
      const first = startTestSession({ fixed: false, seed: 7 });
      const second = startTestSession({ fixed: false, seed: 7 });
      walk(first, [...TO_SAGE]);
      walk(second, [...TO_SAGE]);

      expect(first.interact().payload?.question).toEqual(second.interact().payload?.question);
    });
  });

  describe('defeat threshold', () => {
    function answerTwoOfThree(defeatThreshold: number) {
      const session = startTestSession({ defeatThreshold });
      walk(session, [...TO_SAGE]);
      session.interact();
      session.answer(1);
      session.answer('2');
      return { session, last: session.answer('42') };
    }

    it('convinces the NPC when the ratio reaches a permissive threshold', () => {
      const { session, last } = answerTwoOfThree(0.6);

      expect(last.message).toBe('Exactly. Sage is convinced. The way down is open.');
      expect(last.payload).toMatchObject({ npcDefeated: true, floorComplete: true });
      expect(session.view().player.coherence).toBe(66);
    });

    it('leaves the NPC unconvinced under the default threshold', () => {
      const { session, last } = answerTwoOfThree(1);

      expect(last.message).toBe('Exactly. Sage is not convinced. Talk again to retry.');
      expect(last.payload).toMatchObject({ npcDefeated: false, floorComplete: false });
      expect(session.view().floorComplete).toBe(false);
      expect(session.interact().kind).toBe('conversation_started');
    });
  });

  describe('full dive', () => {
    it('convinces both floors and wins through the exit', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();

      const first = session.answer(1);
      expect(first.payload).toMatchObject({ isCorrect: true, coherenceDelta: 8, knowledgeGained: 'Counting' });
      expect(first.payload?.question?.id).toBe('q-mc-2');
      session.answer('1');
      const last = session.answer('42');
      expect(last.message).toBe('Exactly. Sage is convinced. The way down is open.');
      expect(last.payload).toMatchObject({ coherenceDelta: 4, conversationCompleted: true, npcDefeated: true });

      let view = session.view();
      expect(view.player.coherence).toBe(100);
      expect(view.floorComplete).toBe(true);
      expect(view.score).toBe(3 * 100 + 200 + 50 + 100 * 10);

      walk(session, [...repeat('right' as const, 7), 'down', 'down', 'down']);
      const onStairs = session.move('down');
      expect(onStairs.message).toBe('You stand on the stairs down. Interact to use them.');
      expect(onStairs.payload).toEqual({ position: { x: 10, y: 6 }, stairs: 'down' });

      const descended = session.interact();
      expect(descended).toEqual({
        ok: true,
        kind: 'floor_changed',
        message: 'You descend to floor 2.',
        warnings: [],
        payload: { floor: 2, position: { x: 10, y: 1 } },
      });
      view = session.view();
      expect(view.floor).toBe(2);
      expect(view.entities.slice(0, 2).map((entity) => [entity.id, entity.name])).toEqual([
        ['stairs-up-2', 'Stairs up'],
        ['stairs-down-2', 'Exit'],
      ]);

      // Shade only has two questions; the first attempt fails
      walk(session, [...repeat('left' as const, 5), 'down']);
      const started = session.interact();
      expect(started.warnings).toEqual(['Shade only has 2 of 3 questions']);
      expect(started.payload?.question).toMatchObject({ id: 'q-ft-2', kind: 'short_answer', answers: [], total: 2 });

      const wrong = session.answer('O(n^2)');
      expect(wrong.payload?.coherenceDelta).toBe(-45);
      const retryNeeded = session.answer('y');
      expect(retryNeeded.message).toBe('It is. Shade is not convinced. Talk again to retry.');
      expect(session.view().player.coherence).toBe(63);

      session.interact();
      expect(session.answer('linear').payload?.knowledgeGained).toBe('Scanning');
      const convinced = session.answer('yes');
      expect(convinced.message).toBe('It is. Shade is convinced. The way down is open.');
      expect(session.view().player.coherence).toBe(79);

      walk(session, [...repeat('left' as const, 4), 'down', 'down', 'down']);
      expect(session.move('down').message).toBe('You stand on the exit. Interact to use them.');

      const victory = session.interact();
      expect(victory.kind).toBe('victory');
      expect(victory.payload?.status).toBe('victory');
      expect(victory.payload?.stats).toEqual({
        questionsAnswered: 7,
        questionsCorrect: 6,
        questionsWrong: 1,
        accuracy: 6 / 7,
        npcsDefeated: 2,
        knowledgeModules: 2,
        coherence: 79,
        floor: 2,
        score: 6 * 100 + 2 * 200 + 2 * 50 + 79 * 10,
      });
      expect(session.isOver()).toBe(true);

      const after = session.move('up');
      expect(after).toMatchObject({
        ok: false,
        kind: 'game_over',
        message: 'The dive is complete. Start a new session to play again.',
      });
    });

    it('climbs back to floor 1 onto its down stairs', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();
      session.answer(1);
      session.answer('1');
      session.answer('42');
      walk(session, [...repeat('right' as const, 7), ...repeat('down' as const, 4)]);
      session.interact();

      walk(session, [...repeat('left' as const, 8)]);
      expect(session.move('left').message).toBe('You stand on the stairs up. Interact to use them.');

      const climbed = session.interact();
      expect(climbed).toMatchObject({ kind: 'floor_changed', message: 'You climb to floor 1.' });
      expect(climbed.payload).toEqual({ floor: 1, position: { x: 10, y: 6 } });
      expect(session.view().floorComplete).toBe(true);
      expect(session.view().player.coherence).toBe(100);
    });
  });

  describe('defeat', () => {
    it('ends the run when coherence reaches zero', () => {
      const session = startTestSession();
      walk(session, [...TO_SAGE]);
      session.interact();

      session.answer(0);
      session.answer('2');
      const result = session.answer('nope');

      expect(result.kind).toBe('defeat');
      expect(result.message).toBe('Not the answer. Your coherence collapses.');
      expect(result.payload).toMatchObject({ coherenceDelta: -20, status: 'defeat' });
      expect(result.payload?.stats).toEqual({
        questionsAnswered: 3,
        questionsCorrect: 0,
        questionsWrong: 3,
        accuracy: 0,
        npcsDefeated: 0,
        knowledgeModules: 0,
        coherence: 0,
        floor: 1,
        score: 0,
      });

      const view = session.view();
      expect(view.status).toBe('defeat');
      expect(view.conversation).toBeNull();

      for (const command of [() => session.move('left'), () => session.interact(), () => session.answer(1)]) {
        expect(command()).toMatchObject({
          ok: false,
          kind: 'game_over',
          message: 'Your coherence is gone. Start a new session to play again.',
        });
      }
    });
  });
});
