import { NextFunction, Request, Response } from "express";
import { DashboardService } from "../services/dashboard.service";
import { UserService } from "../services/user.service";
import { sendCreated, sendDeleted, sendList, sendSuccess } from "../utils/response";
import { deleteUserQuery } from "../validators/user.validator";

export class UserController {
  constructor(
    private readonly users: UserService,
    private readonly dashboard: DashboardService
  ) {}

  /**
   * @route POST /api/users
   */
  createUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await this.users.createUser(req.body);
      sendCreated(res, "User created", user);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route GET /api/users
   */
  listUsers = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const users = await this.users.listUsers();
      sendList(res, "users", users);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route GET /api/users/:id
   */
  getUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await this.users.getUser(Number(req.params.id));
      sendSuccess(res, "User retrieved", user);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route PATCH /api/users/:id
   */
  updateUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await this.users.updateUser(Number(req.params.id), req.body);
      sendSuccess(res, "User updated", user);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route DELETE /api/users/:id?cascade=true
   */
  deleteUser = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { cascade } = deleteUserQuery.parse(req.query);
      await this.users.deleteUser(Number(req.params.id), { cascade });
      sendDeleted(res, "User");
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route GET /api/users/:id/summary
   */
  getSummary = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await this.dashboard.getUserSummary(Number(req.params.id));
      sendSuccess(res, "Summary retrieved", summary);
    } catch (error) {
      next(error);
    }
  };
}
