export interface WeightRecord {
  id: number;
  userId: number;
  weightKg: number;
  recordedDate: string; // YYYY-MM-DD
  notes: string | null;
  createdAt: Date;
}

export interface LatestWeight {
  userId: number;
  username: string;
  weightKg: number;
  recordedDate: string;
}
