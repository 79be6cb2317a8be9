import type { Announcement } from '@mesh-jeopardy/shared';

export const ANNOUNCEMENT_SINK = Symbol('ANNOUNCEMENT_SINK');

/** Sortie de la session : annonces sur le canal public et messages directs aux joueurs */
export interface AnnouncementSink {
  publish(announcement: Announcement): void;
  direct(nodeId: string, text: string): void;
}
