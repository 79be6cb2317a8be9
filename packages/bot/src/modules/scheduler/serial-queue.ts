/**
 * Point de sérialisation unique : chaque tâche s'exécute après la précédente,
 * qu'elle vienne d'une commande mesh ou d'un timer. L'ordre d'arrivée dans la file
 * fait foi pour départager deux réponses « simultanées ».
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.depth++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.depth--; },
      () => { this.depth--; },
    );
    return result;
  }

  /** Résolu quand toutes les tâches déjà en file sont terminées */
  async drain(): Promise<void> {
    while (this.depth > 0) {
      await this.tail;
    }
  }

  get pending(): number { return this.depth; }
}
