import { NextFunction, Request, Response } from "express";
import { GoalService } from "../services/goal.service";
import { sendCreated, sendDeleted, sendList, sendSuccess } from "../utils/response";
import {
  goalProgressBody,
  goalStatusBody,
  listGoalsQuery,
} from "../validators/goal.validator";

export class GoalController {
  constructor(private readonly goals: GoalService) {}

  setGoal = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const goal = await this.goals.setGoal(Number(req.params.id), req.body);
      sendCreated(res, "Goal created", goal);
    } catch (error) {
      next(error);
    }
  };

  listGoals = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = listGoalsQuery.parse(req.query);
      const goals = await this.goals.listGoals(Number(req.params.id), filter);
      sendList(res, "goals", goals);
    } catch (error) {
      next(error);
    }
  };

  getGoal = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const goal = await this.goals.getGoal(Number(req.params.id));
      sendSuccess(res, "Goal retrieved", goal);
    } catch (error) {
      next(error);
    }
  };

  updateProgress = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { currentValue } = goalProgressBody.parse(req.body);
      const goal = await this.goals.updateGoalProgress(Number(req.params.id), currentValue);
      sendSuccess(res, "Goal progress updated", goal);
    } catch (error) {
      next(error);
    }
  };

  updateStatus = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = goalStatusBody.parse(req.body);
      const goal = await this.goals.updateGoalStatus(Number(req.params.id), status);
      sendSuccess(res, "Goal status updated", goal);
    } catch (error) {
      next(error);
    }
  };

  getProgress = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const progress = await this.goals.getGoalProgress(Number(req.params.id));
      sendSuccess(res, "Goal progress calculated", progress);
    } catch (error) {
      next(error);
    }
  };

  deleteGoal = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.goals.deleteGoal(Number(req.params.id));
      sendDeleted(res, "Goal");
    } catch (error) {
      next(error);
    }
  };
}
