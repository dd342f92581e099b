import { Classified, ExerciseCategory } from "../../common/common-enum";

export interface ExerciseType {
  id: number;
  name: string;
  category: string | null;
  categoryTag: Classified<ExerciseCategory> | null;
  caloriesPerMinute: number | null;
}
