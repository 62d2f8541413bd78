import { Request, Response } from 'express';

export const MAX_LIMIT = 1000;

const singleValue = (req: Request, res: Response, name: string): string | undefined => {
  const value = req.query[name];
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') {
    res.status(400);
    throw new Error(`Query parameter '${name}' must be given once`);
  }
  return value;
};

/** Reads `?limit=`; falls back to `fallback`, caps at MAX_LIMIT. */
export const parseLimit = (req: Request, res: Response, fallback: number): number => {
  const raw = singleValue(req, res, 'limit');
  if (raw === undefined) return fallback;

  const limit = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(limit) || limit < 1) {
    res.status(400);
    throw new Error('limit must be a positive integer');
  }
  return Math.min(limit, MAX_LIMIT);
};

export const parseStringFilter = (req: Request, res: Response, name: string): string | undefined =>
  singleValue(req, res, name);

export const parseEnumFilter = <T extends string>(
  req: Request,
  res: Response,
  name: string,
  allowed: readonly T[],
): T | undefined => {
  const raw = singleValue(req, res, name);
  if (raw === undefined) return undefined;

  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    res.status(400);
    throw new Error(`Invalid ${name}. Must be one of: ${allowed.join(', ')}`);
  }
  return match;
};
