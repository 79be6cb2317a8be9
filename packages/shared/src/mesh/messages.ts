// Types partagés entre le bot et le pont radio (bridge) qui parle au nœud mesh

export type ChannelContext =
  | { kind: 'direct' }
  | { kind: 'channel'; index: number; name?: string };

export type InboundMeshMessage = {
  senderId: string;
  senderName?: string;
  channel: ChannelContext;
  text: string;
  receivedAt: number;
};

export type OutboundMeshMessage =
  | { id: number; kind: 'channel'; channel: string; text: string }
  | { id: number; kind: 'direct'; to: string; text: string };

export interface LeaderboardEntry { playerId: string; name: string; score: number; rank: number }

export interface ScoreDelta { playerId: string; name: string; delta: number; correct: boolean }

export type StopReason = 'admin' | 'max_rounds' | 'out_of_questions';

export type EVGameStarted = { type: 'game_started'; sessionNumber: number; maxRounds: number; text: string };
export type EVRoundOpened = {
  type: 'round_opened';
  roundId: string;
  roundNumber: number;
  maxRounds: number;
  value: number;
  prompt: string;
  closesAt: number;
  text: string;
};
export type EVRoundSettled = {
  type: 'round_settled';
  roundId: string;
  answer: string;
  deltas: ScoreDelta[];
  standings: LeaderboardEntry[];
  text: string;
};
export type EVGameStopped = { type: 'game_stopped'; reason: StopReason; leaderboard: LeaderboardEntry[]; text: string };

export type Announcement = EVGameStarted | EVRoundOpened | EVRoundSettled | EVGameStopped;

export type BridgeOutboxResponse = { messages: OutboundMeshMessage[]; remaining: number };
