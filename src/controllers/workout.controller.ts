import { NextFunction, Request, Response } from "express";
import { WorkoutSessionService } from "../services/workoutSession.service";
import { sendCreated, sendDeleted, sendList, sendSuccess } from "../utils/response";
import { dateRangeQuery } from "../validators/common.validator";
import { caloriesQuery } from "../validators/workout.validator";

export class WorkoutController {
  constructor(private readonly workouts: WorkoutSessionService) {}

  logWorkout = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.workouts.logWorkout(Number(req.params.id), req.body);
      sendCreated(res, "Workout logged", session);
    } catch (error) {
      next(error);
    }
  };

  listSessions = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const range = dateRangeQuery.parse(req.query);
      const sessions = await this.workouts.listWorkoutSessions(Number(req.params.id), range);
      sendList(res, "workout sessions", sessions);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route GET /api/users/:id/calories?groupBy=day|week&from&to
   */
  getCalories = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { groupBy, from, to } = caloriesQuery.parse(req.query);
      const userId = Number(req.params.id);
      const totals =
        groupBy === "week"
          ? await this.workouts.getWeeklyCalories(userId, { from, to })
          : await this.workouts.getDailyCalories(userId, { from, to });
      sendSuccess(res, `Calorie totals by ${groupBy}`, totals);
    } catch (error) {
      next(error);
    }
  };

  getSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.workouts.getWorkoutSession(Number(req.params.id));
      sendSuccess(res, "Workout session retrieved", session);
    } catch (error) {
      next(error);
    }
  };

  updateSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.workouts.updateWorkoutSession(Number(req.params.id), req.body);
      sendSuccess(res, "Workout session updated", session);
    } catch (error) {
      next(error);
    }
  };

  deleteSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.workouts.deleteWorkoutSession(Number(req.params.id));
      sendDeleted(res, "Workout session");
    } catch (error) {
      next(error);
    }
  };
}
