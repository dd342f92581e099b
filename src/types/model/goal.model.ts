import {
  Classified,
  GoalDirection,
  GoalStatus,
  GoalType,
} from "../../common/common-enum";

export interface Goal {
  id: number;
  userId: number;
  goalType: string;
  goalTypeTag: Classified<GoalType>;
  targetValue: number | null;
  currentValue: number;
  targetDate: string | null;
  status: string;
  statusTag: Classified<GoalStatus>;
  createdAt: Date;
}

export interface GoalProgress {
  goalId: number;
  goalType: string;
  direction: GoalDirection;
  baseline: number;
  currentValue: number;
  targetValue: number;
  /** Unclamped; negative when moving away from the target. */
  ratio: number;
  percent: number; // 0-100
  movingTowardTarget: boolean;
  targetReached: boolean;
  remaining: number;
}
