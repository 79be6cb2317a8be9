import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { Announcement, LeaderboardEntry, ScoreDelta, StopReason } from '@mesh-jeopardy/shared';
import { GAME_CONFIG, GameConfig, normalizeNodeId } from '../config/game-config';
import { LEDGER, Ledger } from '../ledger/ledger';
import { SchedulerService, TimerHandle } from '../scheduler/scheduler.service';
import { ClockService } from '../scheduler/clock.service';
import { SerialQueue } from '../scheduler/serial-queue';
import { ScoringService } from '../scoring/scoring.service';
import { AdminGate } from '../auth/admin-gate';
import { StructuredLoggerService } from '../common/structured-logger.service';
import { MetricsService } from '../common/metrics.service';
import { GameResult, fail, ok } from '../common/game-result';
import { ANNOUNCEMENT_SINK, AnnouncementSink } from './announcement-sink';
import { AnswerIntake } from './answer-intake';
import { BanList } from './ban-list';
import { QuestionBankService } from './question-bank.service';
import { RoundState } from './round-state';
import * as announce from './announcements';
import {
  CloseTrigger,
  Question,
  SessionSnapshot,
  SessionStatus,
  Submission,
} from './game-types';

export interface SubmissionReceipt {
  roundId: string;
  roundNumber: number;
  closesAt: number;
}

export interface JoinReceipt {
  added: boolean;
  playerCount: number;
}

interface RosterEntry {
  nodeId: string;
  name?: string;
}

interface GradedSubmission {
  submission: Submission;
  correct: boolean;
  delta: number;
}

const FINAL_LEADERBOARD_SIZE = 5;
const ROUND_STANDINGS_SIZE = 3;
const SETTLEMENT_DURATION_BUCKETS = [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

/**
 * Machine à états de la partie : Idle -> Running -> Stopped (un nouveau `start` relance).
 *
 * Toutes les mutations passent par `queue` : commandes admin, réponses des joueurs et
 * callbacks des timers. Deux timers indépendants par manche : fermeture à
 * `opensAt + answerWindow` et ouverture de la suivante à `opensAt + questionInterval`.
 */
@Injectable()
export class GameSessionService implements OnModuleInit, OnModuleDestroy {
  private readonly queue = new SerialQueue();
  private readonly bans = new BanList();
  private readonly intake = new AnswerIntake(this.bans);

  private status: SessionStatus = 'Idle';
  private sessionNumber = 0;
  private roundCounter = 0;
  private questions: Question[] = [];
  private cursor = 0;
  private currentRound?: RoundState;
  private closeTimer?: TimerHandle;
  private nextOpenTimer?: TimerHandle;
  private roster = new Map<string, RosterEntry>(); // id normalisé -> joueur inscrit
  private startedAt?: number;

  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    @Inject(LEDGER) private readonly ledger: Ledger,
    @Inject(ANNOUNCEMENT_SINK) private readonly sink: AnnouncementSink,
    private readonly scheduler: SchedulerService,
    private readonly clock: ClockService,
    private readonly adminGate: AdminGate,
    private readonly scoring: ScoringService,
    private readonly questionBank: QuestionBankService,
    private readonly logger: StructuredLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  onModuleInit() {
    this.metrics.registerGauge('session.running');
    this.metrics.registerGauge('round.open');
    this.metrics.registerGauge('players.banned');
    if (!this.adminGate.hasAdmins) {
      this.logger.warn('No admin node ids configured: nobody can start a game');
    }
  }

  onModuleDestroy() {
    this.cancelTimers();
  }

  // ===== Commandes admin =====

  start(adminId: string): Promise<GameResult<SessionSnapshot>> {
    return this.queue.run(async () => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can start games!');
      if (this.status === 'Running') return fail('InvalidState', '⚠️ Game already in progress!');

      let questions: Question[];
      try {
        questions = await this.questionBank.load();
      } catch (err) {
        this.logger.error('Question bank unavailable', err);
        return fail('InvalidState', 'Question bank unavailable, check the bot logs.');
      }
      if (questions.length === 0) return fail('InvalidState', 'No questions loaded.');

      this.sessionNumber += 1;
      this.status = 'Running';
      this.roundCounter = 0;
      this.questions = questions;
      this.cursor = 0;
      this.currentRound = undefined;
      this.intake.reset();
      this.roster.clear();
      this.startedAt = this.clock.now();
      this.metrics.set('session.running', 1);
      this.metrics.inc('session.started');
      this.logger.logSessionAction('started', this.sessionNumber, {
        nodeId: normalizeNodeId(adminId),
        questions: questions.length,
        maxRounds: this.config.maxRounds,
      });

      this.emit(announce.gameStarted(this.sessionNumber, this.config.maxRounds, this.config.answerWindowMs));
      await this.openNextRound();
      return ok(this.snapshot());
    });
  }

  stop(adminId: string): Promise<GameResult<SessionSnapshot>> {
    return this.queue.run(async () => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can stop games!');
      if (this.status !== 'Running') return fail('InvalidState', '⏸️ No game in progress!');

      // Annuler d'abord la fermeture programmée : pas de double règlement
      this.cancelTimers();
      const round = this.currentRound;
      if (round?.isOpen) await this.closeRound(round.id, 'stop');
      await this.finish('admin');
      return ok(this.snapshot());
    });
  }

  skip(adminId: string): Promise<GameResult<SessionSnapshot>> {
    return this.queue.run(async () => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can skip questions!');
      const round = this.currentRound;
      if (this.status !== 'Running' || !round?.isOpen) return fail('InvalidState', '⏸️ No open question to skip.');

      this.scheduler.cancel(this.closeTimer);
      this.closeTimer = undefined;
      // La manche suivante garde son horaire : nextOpenTimer n'est pas touché
      await this.closeRound(round.id, 'skip');
      return ok(this.snapshot());
    });
  }

  ban(adminId: string, targetId: string): Promise<GameResult<{ target: string; changed: boolean }>> {
    return this.queue.run(() => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can ban users!');
      const target = normalizeNodeId(targetId);
      if (!target) return fail('InvalidState', 'Usage: !hj ban <node id>');
      const changed = this.bans.ban(target, adminId, this.clock.now());
      this.metrics.set('players.banned', this.bans.size);
      this.logger.info('Player banned', { nodeId: target, bannedBy: normalizeNodeId(adminId), changed });
      return ok({ target, changed });
    });
  }

  unban(adminId: string, targetId: string): Promise<GameResult<{ target: string; changed: boolean }>> {
    return this.queue.run(() => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can unban users!');
      const target = normalizeNodeId(targetId);
      if (!target) return fail('InvalidState', 'Usage: !hj unban <node id>');
      const changed = this.bans.unban(target);
      this.metrics.set('players.banned', this.bans.size);
      this.logger.info('Player unbanned', { nodeId: target, changed });
      return ok({ target, changed });
    });
  }

  /** Remise à zéro des totaux cumulés ; refusée pendant une partie */
  resetScores(adminId: string): Promise<GameResult<null>> {
    return this.queue.run(async () => {
      if (!this.adminGate.isAdmin(adminId)) return fail('Unauthorized', '❌ Only admins can reset scores!');
      if (this.status === 'Running') return fail('InvalidState', 'Stop the game before resetting scores.');
      try {
        await this.ledger.reset();
      } catch (err) {
        this.logger.error('Ledger reset failed', err);
        return fail('InvalidState', 'Score reset failed, check the bot logs.');
      }
      this.logger.info('Scores reset', { nodeId: normalizeNodeId(adminId) });
      return ok(null);
    });
  }

  // ===== Joueurs =====

  join(nodeId: string, name?: string): Promise<GameResult<JoinReceipt>> {
    return this.queue.run(() => {
      const id = normalizeNodeId(nodeId);
      if (this.bans.isBanned(id)) return fail('Banned', '🚫 You are banned from playing.');
      if (this.status !== 'Running') {
        return fail('InvalidState', '⏸️ No game in progress. Wait for an admin to start one!');
      }

      const added = !this.roster.has(id);
      this.roster.set(id, { nodeId: id, name: name ?? this.roster.get(id)?.name });
      const round = this.currentRound;
      if (added && round?.isOpen) {
        this.directSafe(id, announce.questionLine(round, this.config.maxRounds));
      }
      return ok({ added, playerCount: this.roster.size });
    });
  }

  /**
   * `arrivedAt` est l'heure de réception au routeur : une réponse arrivée après
   * `closesAt` mais traitée plus tard est refusée (NoOpenRound), jamais notée.
   */
  submit(nodeId: string, text: string, arrivedAt: number, name?: string): Promise<GameResult<SubmissionReceipt>> {
    return this.queue.run(() => {
      const id = normalizeNodeId(nodeId);
      if (this.status !== 'Running') {
        return fail('NoOpenRound', '⏸️ No game in progress. Wait for an admin to start one!');
      }
      const round = this.currentRound;
      const outcome = this.intake.submit(id, round?.id ?? '', text, arrivedAt, name);

      if (!outcome.accepted) {
        this.metrics.inc(`submission.rejected.${outcome.reason}`);
        switch (outcome.reason) {
          case 'Banned':
            return fail('Banned', '🚫 You are banned from playing.');
          case 'DuplicateSubmission':
            return fail('DuplicateSubmission', '⚠️ You already answered this question!');
          default:
            return fail('NoOpenRound', this.noOpenRoundMessage(arrivedAt));
        }
      }

      this.metrics.inc('submission.accepted');
      if (name && this.roster.has(id)) this.roster.set(id, { nodeId: id, name });
      const accepted = outcome.submission;
      return ok({
        roundId: accepted.roundId,
        roundNumber: round?.number ?? 0,
        closesAt: round?.closesAt ?? arrivedAt,
      });
    });
  }

  // ===== Lecture =====

  snapshot(): SessionSnapshot {
    const round = this.currentRound;
    const now = this.clock.now();
    return {
      status: this.status,
      sessionNumber: this.sessionNumber,
      roundCounter: this.roundCounter,
      maxRounds: this.config.maxRounds,
      players: this.roster.size,
      banned: this.bans.size,
      round: round && {
        id: round.id,
        number: round.number,
        value: round.question.value,
        prompt: round.question.prompt,
        status: round.status,
        opensAt: round.opensAt,
        closesAt: round.closesAt,
        remainingMs: round.remainingMs(now),
        submissions: this.intake.countFor(round.id),
      },
    };
  }

  scores(limit = FINAL_LEADERBOARD_SIZE): Promise<LeaderboardEntry[]> {
    return this.queue.run(() => this.standings(limit));
  }

  /** Attend que toutes les tâches en file (commandes et timers déjà déclenchés) soient traitées */
  whenIdle(): Promise<void> {
    return this.queue.drain();
  }

  // ===== Cycle des manches (toujours appelé depuis la file) =====

  /**
   * `afterRoundId` : manche qui a programmé cette ouverture. Un timer déjà déclenché
   * mais resté en file derrière un stop/start ne doit pas toucher la nouvelle partie.
   */
  private async openNextRound(afterRoundId?: string): Promise<void> {
    if (this.status !== 'Running') return;
    if (afterRoundId !== undefined && this.currentRound?.id !== afterRoundId) {
      this.logger.debug('Stale round open ignored', { afterRoundId, currentRoundId: this.currentRound?.id });
      return;
    }

    // Intervalle égal à la fenêtre : la fermeture peut ne pas être encore passée
    const previous = this.currentRound;
    if (previous?.isOpen) {
      this.scheduler.cancel(this.closeTimer);
      this.closeTimer = undefined;
      await this.closeRound(previous.id, 'timer');
    }

    if (this.roundCounter >= this.config.maxRounds) {
      await this.finish('max_rounds');
      return;
    }
    const question = this.questions[this.cursor];
    if (!question) {
      await this.finish('out_of_questions');
      return;
    }

    this.cursor += 1;
    this.roundCounter += 1;
    const opensAt = this.clock.now();
    const round = new RoundState(
      `${this.sessionNumber}-${this.roundCounter}`,
      this.roundCounter,
      question,
      opensAt,
      opensAt + this.config.answerWindowMs,
    );
    this.currentRound = round;
    this.intake.open(round);

    // Les deux timers partent de l'ouverture : un skip ne décale pas le rythme
    this.closeTimer = this.scheduler.after(
      this.config.answerWindowMs,
      () => this.runTimerTask(`close ${round.id}`, () => this.closeRound(round.id, 'timer')),
      `close ${round.id}`,
    );
    this.nextOpenTimer = this.scheduler.after(
      this.config.questionIntervalMs,
      () => this.runTimerTask(`open after ${round.id}`, () => this.openNextRound(round.id)),
      `open after ${round.id}`,
    );

    this.metrics.set('round.open', 1);
    this.metrics.inc('round.opened');
    this.logger.info('Round opened', {
      sessionNumber: this.sessionNumber,
      roundId: round.id,
      questionId: question.id,
      value: question.value,
      closesAt: new Date(round.closesAt).toISOString(),
    });

    this.emit(announce.roundOpened(round, this.config.maxRounds));
    const dm = announce.questionLine(round, this.config.maxRounds);
    for (const player of this.roster.values()) {
      if (!this.bans.isBanned(player.nodeId)) this.directSafe(player.nodeId, dm);
    }
  }

  private async closeRound(roundId: string, trigger: CloseTrigger): Promise<void> {
    const round = this.currentRound;
    // Timer et skip concurrents : le second trouve la manche déjà hors de Open
    if (!round || round.id !== roundId || !round.beginGrading()) {
      this.logger.debug('Round close ignored', { roundId, trigger });
      return;
    }
    if (this.closeTimer && trigger !== 'timer') this.scheduler.cancel(this.closeTimer);
    this.closeTimer = undefined;

    const started = Date.now();
    const graded = this.grade(round);
    try {
      await this.settle(round, graded);
      this.metrics.inc('round.settled');
    } catch (err) {
      this.metrics.inc('round.settlement_failed');
      this.logger.error('Round settlement failed, continuing with next round', err, {
        roundId: round.id,
        settled: round.settledPlayers.size,
        expected: graded.length,
      });
    } finally {
      round.close();
      this.metrics.set('round.open', 0);
      this.metrics.observe('round.settlement_seconds', (Date.now() - started) / 1000, SETTLEMENT_DURATION_BUCKETS);
    }

    const deltas: ScoreDelta[] = graded
      .filter((g) => round.settledPlayers.has(g.submission.playerId))
      .map((g) => ({
        playerId: g.submission.playerId,
        name: this.displayName(g.submission.playerId, g.submission.playerName),
        delta: g.delta,
        correct: g.correct,
      }));
    const standings = await this.standings(ROUND_STANDINGS_SIZE);
    this.logger.info('Round settled', { roundId: round.id, trigger, scorers: deltas.length });
    this.emit(announce.roundSettled(round, deltas, standings));
  }

  private grade(round: RoundState): GradedSubmission[] {
    return this.intake.submissionsFor(round.id).map((submission) => ({
      submission,
      ...this.scoring.grade({
        submitted: submission.text,
        acceptedAnswers: round.question.answers,
        value: round.question.value,
      }),
    }));
  }

  /** Réessaie après une panne de persistance sans recréditer les joueurs déjà réglés */
  private async settle(round: RoundState, graded: GradedSubmission[]): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        for (const g of graded) {
          const playerId = g.submission.playerId;
          if (round.settledPlayers.has(playerId)) continue;
          await this.ledger.applyDelta(playerId, g.delta, this.displayName(playerId, g.submission.playerName));
          round.settledPlayers.add(playerId);
        }
        return;
      } catch (err) {
        if (attempt >= this.config.settlementRetries) throw err;
        this.logger.warn('Settlement attempt failed, retrying', {
          roundId: round.id,
          attempt: attempt + 1,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private async finish(reason: StopReason): Promise<void> {
    this.cancelTimers();
    this.status = 'Stopped';
    this.metrics.set('session.running', 0);
    this.metrics.set('round.open', 0);
    const leaderboard = await this.standings(FINAL_LEADERBOARD_SIZE);
    this.logger.logSessionAction('stopped', this.sessionNumber, {
      reason,
      rounds: this.roundCounter,
      duration: this.startedAt ? this.clock.now() - this.startedAt : undefined,
    });
    this.emit(announce.gameStopped(reason, leaderboard));
  }

  // ===== Utilitaires =====

  private runTimerTask(label: string, task: () => Promise<void>) {
    this.queue.run(task).catch((err) => {
      this.logger.error(`Timer task ${label} failed`, err, { sessionNumber: this.sessionNumber });
    });
  }

  private cancelTimers() {
    this.scheduler.cancel(this.closeTimer);
    this.scheduler.cancel(this.nextOpenTimer);
    this.closeTimer = undefined;
    this.nextOpenTimer = undefined;
  }

  private async standings(limit: number): Promise<LeaderboardEntry[]> {
    try {
      const top = await this.ledger.topN(limit);
      return top.map((s, i) => ({ playerId: s.playerId, name: s.name, score: s.total, rank: i + 1 }));
    } catch (err) {
      this.logger.error('Leaderboard read failed', err);
      return [];
    }
  }

  private displayName(playerId: string, fallback?: string): string {
    return fallback ?? this.roster.get(playerId)?.name ?? playerId;
  }

  private noOpenRoundMessage(arrivedAt: number): string {
    if (this.status !== 'Running') return '⏸️ No game in progress. Wait for an admin to start one!';
    const round = this.currentRound;
    if (round && round.status === 'Open' && arrivedAt > round.closesAt) return '⏰ Too late! Answer window closed.';
    return '⏳ No active question right now. Wait for the next one!';
  }

  private emit(announcement: Announcement) {
    try {
      this.sink.publish(announcement);
    } catch (err) {
      this.logger.error('Announcement delivery failed', err, { type: announcement.type });
    }
  }

  private directSafe(nodeId: string, text: string) {
    try {
      this.sink.direct(nodeId, text);
    } catch (err) {
      this.logger.error('Direct message failed', err, { nodeId });
    }
  }
}
