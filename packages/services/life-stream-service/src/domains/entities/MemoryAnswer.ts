export interface MemoryLocation {
  lat: number;
  lon: number;
  timestamp: string;
}

export interface MemoryPerson {
  id: string;
  name: string;
  email?: string;
}

export interface MemoryTransaction {
  timestamp: string;
  item: string;
  amount: number;
  place: string;
  category: string;
}

export interface MemoryAnswer {
  question: string;
  answer: string;
  confidence: number;
  eventsAnalyzed: number;
  timeRange: { start: string | null; end: string | null };
  locations: MemoryLocation[];
  people: MemoryPerson[];
  transactions: MemoryTransaction[];
  reasoning: string | null;
  sources: string[];
}
