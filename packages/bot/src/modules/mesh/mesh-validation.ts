import { z } from 'zod';
import type { ChannelContext, InboundMeshMessage } from '@mesh-jeopardy/shared';

/**
 * Paquet texte remonté par le pont radio. `direct` indique un message adressé
 * au nœud du bot ; sinon `channel` donne l'index du canal de réception.
 */
export const MeshPacketSchema = z.object({
  from: z.string().trim().min(1).max(32),
  fromName: z.string().trim().min(1).max(40).optional(),
  direct: z.boolean().default(false),
  channel: z.number().int().min(0).max(7).default(0),
  channelName: z.string().max(32).optional(),
  text: z.string().max(1000),
});

export type MeshPacket = z.infer<typeof MeshPacketSchema>;

export const OutboxQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function validatePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', '),
  };
}

export function toInboundMessage(packet: MeshPacket, receivedAt: number): InboundMeshMessage {
  const channel: ChannelContext = packet.direct
    ? { kind: 'direct' }
    : { kind: 'channel', index: packet.channel, name: packet.channelName };
  return {
    senderId: packet.from,
    senderName: packet.fromName,
    channel,
    text: packet.text,
    receivedAt,
  };
}
