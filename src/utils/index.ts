import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wrap an async controller so rejected promises reach the error handler.
 */
export const serviceHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => (req, res, next) => {
  fn(req, res, next).catch(next);
};

/** Round a monetary amount to two decimal places (half away from zero). */
export const roundMoney = (value: number): number => {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
};

export const toAmount = (value: unknown): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

/** `YYYY-MM-DD` for a date, in UTC. */
export const toDateOnly = (date: Date): string => date.toISOString().slice(0, 10);

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
