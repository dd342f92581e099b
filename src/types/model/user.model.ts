export interface User {
  id: number;
  username: string;
  email: string;
  age: number | null;
  heightCm: number | null; // cm
  createdAt: Date;
}
