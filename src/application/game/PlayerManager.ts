// Application layer: Player manager
// Owns the player's position, coherence and answer statistics

import type { Position } from '@/domain/game/types.js';
import type { PlayerSnapshot } from '@/domain/game/GameState.js';
import type { PlayerView } from '@/domain/game/session.js';
import { invariant } from '@/utils/errors.js';

export class PlayerManager {
  private position: Position;
  private coherence: number;
  private readonly maxCoherence: number;
  private knowledge = new Set<string>();
  private questionsAnswered = 0;
  private questionsCorrect = 0;
  private questionsWrong = 0;
  private defeated: string[] = [];

  constructor(start: Position, coherence: number, maxCoherence: number) {
    invariant(maxCoherence > 0, 'Maximum coherence must be positive', { maxCoherence });
    invariant(coherence >= 0 && coherence <= maxCoherence, 'Coherence out of range', { coherence, maxCoherence });

    this.position = { ...start };
    this.coherence = coherence;
    this.maxCoherence = maxCoherence;
  }

  getPosition(): Position {
    return { ...this.position };
  }

  moveTo(position: Position): void {
    this.position = { x: position.x, y: position.y };
  }

  getCoherence(): number {
    return this.coherence;
  }

  /**
   * Clamp into [0, max] and return the change actually applied.
   */
  adjustCoherence(delta: number): number {
    const before = this.coherence;
    this.coherence = Math.min(this.maxCoherence, Math.max(0, before + delta));
    return this.coherence - before;
  }

  isDepleted(): boolean {
    return this.coherence === 0;
  }

  addKnowledge(label: string): boolean {
    if (this.knowledge.has(label)) return false;
    this.knowledge.add(label);
    return true;
  }

  getKnowledge(): string[] {
    return Array.from(this.knowledge);
  }

  recordAnswer(correct: boolean): void {
    this.questionsAnswered++;
    if (correct) {
      this.questionsCorrect++;
    } else {
      this.questionsWrong++;
    }
  }

  recordDefeat(npcId: string): boolean {
    if (this.defeated.includes(npcId)) return false;
    this.defeated.push(npcId);
    return true;
  }

  get npcsDefeated(): number {
    return this.defeated.length;
  }

  get correctAnswers(): number {
    return this.questionsCorrect;
  }

  accuracy(): number {
    return this.questionsAnswered === 0 ? 0 : this.questionsCorrect / this.questionsAnswered;
  }

  view(): PlayerView {
    return {
      x: this.position.x,
      y: this.position.y,
      coherence: this.coherence,
      maxCoherence: this.maxCoherence,
      knowledge: this.getKnowledge(),
      questionsAnswered: this.questionsAnswered,
      questionsCorrect: this.questionsCorrect,
      questionsWrong: this.questionsWrong,
      npcsDefeated: this.defeated.length,
    };
  }

  toSnapshot(): PlayerSnapshot {
    return {
      x: this.position.x,
      y: this.position.y,
      coherence: this.coherence,
      max_coherence: this.maxCoherence,
      knowledge: this.getKnowledge(),
      questions_answered: this.questionsAnswered,
      questions_correct: this.questionsCorrect,
      questions_wrong: this.questionsWrong,
      npcs_defeated: [...this.defeated],
    };
  }

  static fromSnapshot(snapshot: PlayerSnapshot): PlayerManager {
    const player = new PlayerManager({ x: snapshot.x, y: snapshot.y }, snapshot.coherence, snapshot.max_coherence);
    snapshot.knowledge.forEach((label) => player.knowledge.add(label));
    player.questionsAnswered = snapshot.questions_answered;
    player.questionsCorrect = snapshot.questions_correct;
    player.questionsWrong = snapshot.questions_wrong;
    player.defeated = [...new Set(snapshot.npcs_defeated)];
    return player;
  }
}
