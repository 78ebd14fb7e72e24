// Application layer: Conversation engine
// Question/answer state machine for one NPC interaction

import type { FreeTextQuestion, MultipleChoiceQuestion, Question } from '@/domain/content/types.js';
import type { ConversationStatus, QuestionView } from '@/domain/game/session.js';
import type { ConversationSnapshot } from '@/domain/game/GameState.js';
import type { RandomSource } from '@/infrastructure/game/RandomSource.js';
import { InsufficientContentError, InvalidStateError, SaveLoadError, invariant } from '@/utils/errors.js';
import { matches } from './AnswerMatcher.js';

export interface AnswerResult {
  questionId: string;
  isCorrect: boolean;
  responseText: string;
  rewardKnowledge?: string;
  completed: boolean;
}

export type AnswerAttempt =
  | ({ accepted: true } & AnswerResult)
  | { accepted: false; reason: string };

interface ResolvedAnswer {
  isCorrect: boolean;
  responseText: string;
  rewardKnowledge?: string;
}

function identityOrder(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

function isPermutation(order: number[], length: number): boolean {
  if (order.length !== length) return false;
  const sorted = [...order].sort((a, b) => a - b);
  return sorted.every((value, index) => value === index);
}

export class ConversationEngine {
  private status: ConversationStatus = 'not_started';
  private questions: Question[] = [];
  private answerOrders: number[][] = [];
  private cursor = 0;
  private correctCount = 0;

  constructor(readonly npcId: string) {}

  /**
   * Pick `count` questions from the pool. With an rng both the question
   * order and each multiple-choice answer order are shuffled.
   */
  start(pool: readonly Question[], count: number, rng: RandomSource | null): void {
    if (this.status !== 'not_started') {
      throw new InvalidStateError(`Conversation with ${this.npcId} was already started`, { status: this.status });
    }
    invariant(count >= 1, 'A conversation needs at least one question', { count });

    if (pool.length < count) {
      throw new InsufficientContentError(
        `NPC ${this.npcId} has ${pool.length} eligible questions, ${count} requested`,
        count,
        pool.length
      );
    }

    const ordered = rng ? rng.shuffle(pool) : [...pool];
    this.questions = ordered.slice(0, count);
    this.answerOrders = this.questions.map((question) => {
      if (question.kind !== 'multiple_choice') return [];
      const order = identityOrder(question.answers.length);
      return rng ? rng.shuffle(order) : order;
    });
    this.cursor = 0;
    this.correctCount = 0;
    this.status = 'in_progress';
  }

  getStatus(): ConversationStatus {
    return this.status;
  }

  isCompleted(): boolean {
    return this.status === 'completed';
  }

  get length(): number {
    return this.questions.length;
  }

  get correct(): number {
    return this.correctCount;
  }

  currentQuestion(): Question | null {
    if (this.status !== 'in_progress') return null;
    return this.questions[this.cursor] ?? null;
  }

  view(): QuestionView | null {
    const question = this.currentQuestion();
    if (!question) return null;

    const answers = question.kind === 'multiple_choice'
      ? this.answerOrders[this.cursor].map((original) => question.answers[original].text)
      : [];

    return {
      id: question.id,
      text: question.text,
      kind: question.kind,
      answers,
      number: this.cursor + 1,
      total: this.questions.length,
    };
  }

  /**
   * Number input is a 0-based choice, a numeric string a 1-based choice.
   * Rejected attempts leave the cursor and counters untouched.
   */
  answer(input: number | string): AnswerAttempt {
    if (this.status !== 'in_progress') {
      throw new InvalidStateError(`Conversation with ${this.npcId} is ${this.status}`, { status: this.status });
    }

    const question = this.questions[this.cursor];
    invariant(question !== undefined, 'Conversation cursor out of range', { cursor: this.cursor });

    const resolved = question.kind === 'multiple_choice'
      ? this.resolveChoice(question, this.answerOrders[this.cursor], input)
      : this.resolveFreeText(question, input);

    if ('reason' in resolved) {
      return { accepted: false, reason: resolved.reason };
    }

    if (resolved.isCorrect) {
      this.correctCount++;
    }
    this.cursor++;
    if (this.cursor === this.questions.length) {
      this.status = 'completed';
    }

    return {
      accepted: true,
      questionId: question.id,
      isCorrect: resolved.isCorrect,
      responseText: resolved.responseText,
      rewardKnowledge: resolved.isCorrect ? resolved.rewardKnowledge : undefined,
      completed: this.status === 'completed',
    };
  }

  private resolveChoice(
    question: MultipleChoiceQuestion,
    order: number[],
    input: number | string
  ): ResolvedAnswer | { reason: string } {
    let displayIndex: number;

    if (typeof input === 'number') {
      displayIndex = input;
    } else {
      const trimmed = input.trim();
      if (/^\d+$/.test(trimmed)) {
        displayIndex = parseInt(trimmed, 10) - 1;
      } else {
        const lowered = trimmed.toLowerCase();
        displayIndex = order.findIndex((original) => question.answers[original].text.trim().toLowerCase() === lowered);
        if (displayIndex < 0) {
          return { reason: `Choose one of the ${order.length} listed answers` };
        }
      }
    }

    if (!Number.isInteger(displayIndex) || displayIndex < 0 || displayIndex >= order.length) {
      return { reason: `Choose an answer between 1 and ${order.length}` };
    }

    const answer = question.answers[order[displayIndex]];
    return {
      isCorrect: answer.correct,
      responseText: answer.response,
      rewardKnowledge: answer.rewardKnowledge,
    };
  }

  private resolveFreeText(
    question: FreeTextQuestion,
    input: number | string
  ): ResolvedAnswer | { reason: string } {
    const text = String(input);
    if (text.trim().length === 0) {
      return { reason: 'An answer is required' };
    }

    const isCorrect = matches(text, question.acceptedAnswer, question.matchType, {
      caseSensitive: question.caseSensitive,
    });

    return {
      isCorrect,
      responseText: isCorrect ? question.correctResponse : question.incorrectResponse,
      rewardKnowledge: question.rewardKnowledge,
    };
  }

  toSnapshot(): ConversationSnapshot {
    return {
      npc_id: this.npcId,
      question_ids: this.questions.map((question) => question.id),
      answer_orders: this.answerOrders.map((order) => [...order]),
      cursor: this.cursor,
      correct_count: this.correctCount,
    };
  }

  static restore(snapshot: ConversationSnapshot, questions: ReadonlyMap<string, Question>): ConversationEngine {
    const engine = new ConversationEngine(snapshot.npc_id);
    const resolved: Question[] = [];

    for (const id of snapshot.question_ids) {
      const question = questions.get(id);
      if (!question) {
        throw new SaveLoadError(`Saved conversation references unknown question ${id}`, { npcId: snapshot.npc_id });
      }
      resolved.push(question);
    }

    if (snapshot.answer_orders.length !== resolved.length) {
      throw new SaveLoadError('Saved conversation answer orders do not match its questions');
    }
    resolved.forEach((question, index) => {
      const expected = question.kind === 'multiple_choice' ? question.answers.length : 0;
      if (!isPermutation(snapshot.answer_orders[index], expected)) {
        throw new SaveLoadError(`Saved answer order for question ${question.id} is invalid`);
      }
    });

    if (snapshot.cursor > resolved.length || snapshot.correct_count > snapshot.cursor) {
      throw new SaveLoadError('Saved conversation cursor is out of range', {
        cursor: snapshot.cursor,
        length: resolved.length,
      });
    }

    engine.questions = resolved;
    engine.answerOrders = snapshot.answer_orders.map((order) => [...order]);
    engine.cursor = snapshot.cursor;
    engine.correctCount = snapshot.correct_count;
    engine.status = snapshot.cursor === resolved.length ? 'completed' : 'in_progress';
    return engine;
  }
}
