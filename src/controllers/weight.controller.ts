import { NextFunction, Request, Response } from "express";
import { WeightRecordService } from "../services/weightRecord.service";
import { sendCreated, sendDeleted, sendList, sendSuccess } from "../utils/response";
import { dateRangeQuery } from "../validators/common.validator";

export class WeightController {
  constructor(private readonly weights: WeightRecordService) {}

  recordWeight = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await this.weights.recordWeight(Number(req.params.id), req.body);
      sendCreated(res, "Weight recorded", record);
    } catch (error) {
      next(error);
    }
  };

  getSeries = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const range = dateRangeQuery.parse(req.query);
      const series = await this.weights.getWeightSeries(Number(req.params.id), range);
      sendList(res, "weight records", series);
    } catch (error) {
      next(error);
    }
  };

  getLatestForUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const latest = await this.weights.getLatestWeight(Number(req.params.id));
      sendSuccess(res, latest ? "Latest weight retrieved" : "No weight recorded yet", latest);
    } catch (error) {
      next(error);
    }
  };

  getLatestForAll = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const latest = await this.weights.getLatestWeights();
      sendSuccess(res, "Latest weights retrieved", latest);
    } catch (error) {
      next(error);
    }
  };

  getRecord = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await this.weights.getWeightRecord(Number(req.params.id));
      sendSuccess(res, "Weight record retrieved", record);
    } catch (error) {
      next(error);
    }
  };

  updateRecord = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await this.weights.updateWeightRecord(Number(req.params.id), req.body);
      sendSuccess(res, "Weight record updated", record);
    } catch (error) {
      next(error);
    }
  };

  deleteRecord = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.weights.deleteWeightRecord(Number(req.params.id));
      sendDeleted(res, "Weight record");
    } catch (error) {
      next(error);
    }
  };
}
