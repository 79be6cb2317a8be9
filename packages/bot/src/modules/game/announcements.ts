import type {
  EVGameStarted,
  EVGameStopped,
  EVRoundOpened,
  EVRoundSettled,
  LeaderboardEntry,
  ScoreDelta,
  StopReason,
} from '@mesh-jeopardy/shared';
import { RoundState } from './round-state';

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds >= 60 && totalSeconds % 60 === 0) {
    const minutes = totalSeconds / 60;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  return `${totalSeconds}s`;
}

export function formatSigned(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function gameStarted(sessionNumber: number, maxRounds: number, answerWindowMs: number): EVGameStarted {
  const text = [
    `🎮 HACKER JEOPARDY #${sessionNumber} - GAME ON!`,
    'Send !hj join to play. Questions post here, DM your answers to me.',
    `You have ${formatDuration(answerWindowMs)} per question.`,
    'Correct = +points | Wrong = -points',
    `${maxRounds} rounds total. Good luck! 🚀`,
  ].join('\n');
  return { type: 'game_started', sessionNumber, maxRounds, text };
}

export function questionLine(round: RoundState, maxRounds: number): string {
  return `❓ ROUND ${round.number}/${maxRounds} - ${round.question.value} POINTS\n${round.question.prompt}`;
}

export function roundOpened(round: RoundState, maxRounds: number): EVRoundOpened {
  const window = formatDuration(round.closesAt - round.opensAt);
  return {
    type: 'round_opened',
    roundId: round.id,
    roundNumber: round.number,
    maxRounds,
    value: round.question.value,
    prompt: round.question.prompt,
    closesAt: round.closesAt,
    text: `${questionLine(round, maxRounds)}\n\n⏱️ DM your answer within ${window}!`,
  };
}

export function formatStandings(entries: LeaderboardEntry[]): string {
  return entries.map((e) => `${e.rank}. ${e.name} ${e.score}`).join(' | ');
}

export function roundSettled(round: RoundState, deltas: ScoreDelta[], standings: LeaderboardEntry[]): EVRoundSettled {
  const answer = round.question.answers[0];
  const lines = [`✅ Answer: ${answer}`];
  lines.push(
    deltas.length > 0
      ? deltas.map((d) => `${d.name} ${formatSigned(d.delta)}`).join(' | ')
      : 'No scorers this round.',
  );
  if (standings.length > 0) lines.push(`🏆 ${formatStandings(standings)}`);
  return { type: 'round_settled', roundId: round.id, answer, deltas, standings, text: lines.join('\n') };
}

const MEDALS = ['🥇', '🥈', '🥉'];

export function gameStopped(reason: StopReason, leaderboard: LeaderboardEntry[]): EVGameStopped {
  if (leaderboard.length === 0) {
    return { type: 'game_stopped', reason, leaderboard, text: '🎮 Game over! No scores recorded.' };
  }
  const header = reason === 'out_of_questions' ? '📚 Out of questions!\n' : '';
  const rows = leaderboard.map((e) => `${MEDALS[e.rank - 1] ?? '  '} ${e.rank}. ${e.name}: ${e.score} pts`);
  const text = `${header}🏁 GAME OVER - FINAL SCORES:\n\n${rows.join('\n')}\n\nThanks for playing! 🎉`;
  return { type: 'game_stopped', reason, leaderboard, text };
}

export function formatLeaderboard(entries: LeaderboardEntry[]): string {
  if (entries.length === 0) return '📊 No scores yet!';
  return `📊 LEADERBOARD:\n${entries.map((e) => `${e.rank}. ${e.name}: ${e.score} pts`).join('\n')}`;
}
