import { NextFunction, Request, Response } from "express";
import { ExerciseTypeService } from "../services/exerciseType.service";
import { sendCreated, sendDeleted, sendList, sendSuccess } from "../utils/response";
import { listExerciseTypesQuery } from "../validators/exerciseType.validator";

export class ExerciseTypeController {
  constructor(private readonly exerciseTypes: ExerciseTypeService) {}

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const type = await this.exerciseTypes.createExerciseType(req.body);
      sendCreated(res, "Exercise type created", type);
    } catch (error) {
      next(error);
    }
  };

  list = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = listExerciseTypesQuery.parse(req.query);
      const types = await this.exerciseTypes.listExerciseTypes(filter);
      sendList(res, "exercise types", types);
    } catch (error) {
      next(error);
    }
  };

  get = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const type = await this.exerciseTypes.getExerciseType(Number(req.params.id));
      sendSuccess(res, "Exercise type retrieved", type);
    } catch (error) {
      next(error);
    }
  };

  update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const type = await this.exerciseTypes.updateExerciseType(Number(req.params.id), req.body);
      sendSuccess(res, "Exercise type updated", type);
    } catch (error) {
      next(error);
    }
  };

  remove = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.exerciseTypes.deleteExerciseType(Number(req.params.id));
      sendDeleted(res, "Exercise type");
    } catch (error) {
      next(error);
    }
  };
}
