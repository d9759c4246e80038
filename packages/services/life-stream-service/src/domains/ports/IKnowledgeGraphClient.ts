export interface GraphPerson {
  id: string;
  name: string;
  email?: string;
}

export interface HabitNode {
  title: string;
  description: string;
  confidence: number;
  insightType: string;
  evidenceCount: number;
  source: string;
  discoveredAt: string;
}

export interface IKnowledgeGraphClient {
  resolvePeople(ids: string[]): Promise<GraphPerson[]>;
  /** Links a Habit node to the person; returns the node id. */
  writeHabit(personId: string, habit: HabitNode): Promise<string>;
  isConfigured(): boolean;
}
