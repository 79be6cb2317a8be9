import { Injectable } from '@nestjs/common';
import type { InboundMeshMessage } from '@mesh-jeopardy/shared';
import { AdminGate } from '../auth/admin-gate';
import { GameSessionService } from '../game/game-session.service';
import { SessionSnapshot } from '../game/game-types';
import { formatDuration, formatLeaderboard } from '../game/announcements';
import { GameResult } from '../common/game-result';
import { HjCommand, parseCommand } from './command-parser';
import { Personality } from './personality';

const UNKNOWN_COMMAND = '❓ Unknown command. Use !hj help for commands.';

@Injectable()
export class HackerJeopardyPersonality implements Personality {
  readonly name = 'hacker-jeopardy';

  constructor(
    private readonly session: GameSessionService,
    private readonly adminGate: AdminGate,
  ) {}

  async handleMessage(message: InboundMeshMessage): Promise<string | null> {
    return this.dispatch(parseCommand(message.text), message);
  }

  getHelp(senderId?: string): string {
    let help = [
      '🎮 HACKER JEOPARDY',
      'Questions posted to channel.',
      'DM your answers to me!',
      '',
      'Correct = +points',
      'Wrong = -points',
      'No answer = 0',
      '',
      'Commands:',
      '!hj join - Join the game',
      '!hj status - Game info',
      '!hj scores - Leaderboard',
    ].join('\n');
    if (this.adminGate.hasAdmins && (senderId === undefined || this.adminGate.isAdmin(senderId))) {
      help += '\n\nAdmin: !hj start/stop/next\n!hj ban/unban <id>, !hj reset';
    }
    return help;
  }

  private async dispatch(command: HjCommand, message: InboundMeshMessage): Promise<string | null> {
    const sender = message.senderId;
    switch (command.kind) {
      case 'start':
        return this.reply(await this.session.start(sender), (s) => `✅ Game #${s.sessionNumber} started! Players can !hj join`);
      case 'stop':
        return this.reply(await this.session.stop(sender), () => '🛑 Game stopped.');
      case 'next':
        return this.reply(await this.session.skip(sender), () => '⏭️ Question skipped.');
      case 'reset':
        return this.reply(await this.session.resetScores(sender), () => '🧹 Scores reset.');
      case 'ban':
        return this.reply(await this.session.ban(sender, command.target), (r) =>
          r.changed ? `🚫 Banned ${r.target}` : `${r.target} is already banned.`,
        );
      case 'unban':
        return this.reply(await this.session.unban(sender, command.target), (r) =>
          r.changed ? `✅ Unbanned ${r.target}` : `${r.target} was not banned.`,
        );
      case 'join':
        return this.reply(await this.session.join(sender, message.senderName), (r) =>
          r.added ? `✅ You're in! ${r.playerCount} players joined. Good luck! 🎮` : "👍 You're already in the game!",
        );
      case 'help':
        return this.getHelp(sender);
      case 'status':
        return formatStatus(this.session.snapshot());
      case 'scores':
        return formatLeaderboard(await this.session.scores());
      case 'answer':
        if (!command.text) return null;
        return this.reply(
          await this.session.submit(sender, command.text, message.receivedAt, message.senderName),
          (r) => `📝 Answer locked in for round ${r.roundNumber}! Results when time is up.`,
        );
      case 'unknown':
        return UNKNOWN_COMMAND;
    }
  }

  private reply<T>(result: GameResult<T>, onSuccess: (data: T) => string): string {
    return result.success ? onSuccess(result.data) : result.message;
  }
}

export function formatStatus(snapshot: SessionSnapshot): string {
  if (snapshot.status === 'Idle') return '⏸️ No game in progress.';
  if (snapshot.status === 'Stopped') {
    return `⏸️ Game #${snapshot.sessionNumber} over after ${snapshot.roundCounter}/${snapshot.maxRounds} rounds.`;
  }
  const lines = [
    `🎮 Game #${snapshot.sessionNumber}`,
    `Status: ${snapshot.status}`,
    `Round ${snapshot.roundCounter}/${snapshot.maxRounds}`,
    `Players: ${snapshot.players}`,
  ];
  const round = snapshot.round;
  if (round?.status === 'Open') {
    lines.push(`⏱️ ${formatDuration(round.remainingMs)} left (${round.value} pts)`);
  } else {
    lines.push('Waiting for the next question');
  }
  return lines.join('\n');
}
