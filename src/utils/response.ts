import { Response } from "express";

/** Every JSON body the API answers with. */
export type ApiEnvelope<T> =
  | { success: true; message: string; data?: T }
  | { success: false; message: string; error?: string };

const reply = <T>(res: Response, status: number, body: ApiEnvelope<T>) =>
  res.status(status).json(body);

export const sendSuccess = <T>(res: Response, message: string, data?: T, status = 200) =>
  reply(res, status, { success: true, message, data });

export const sendCreated = <T>(res: Response, message: string, data: T) =>
  sendSuccess(res, message, data, 201);

/** Collections answer with their size in the message, e.g. "Found 3 goals". */
export const sendList = <T>(res: Response, noun: string, items: T[]) =>
  sendSuccess(res, `Found ${items.length} ${noun}`, items);

export const sendDeleted = (res: Response, entity: string) =>
  sendSuccess(res, `${entity} deleted`);

export const sendError = (res: Response, message: string, status = 400, error?: string) =>
  reply(res, status, { success: false, message, error });
