import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { getActingUsername } from '../logger/request-context';

/** The parts of an HTTP request a table reads. */
export interface TableRequest {
  query: Record<string, unknown>;
  path: string;
  username?: string;
}

export function firstParam(query: Record<string, unknown>, key: string): string | undefined {
  const raw = query[key];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' ? value : undefined;
}

export function allParams(query: Record<string, unknown>, key: string): string[] {
  const raw = query[key];
  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  return values.filter((value): value is string => typeof value === 'string' && value !== '');
}

export function toTableRequest(req: Request): TableRequest {
  return {
    query: { ...req.query },
    path: req.path,
    username: getActingUsername(),
  };
}

/**
 * Injects the current request as a {@link TableRequest}.
 */
export const TableQuery = createParamDecorator((_data: unknown, ctx: ExecutionContext): TableRequest => {
  return toTableRequest(ctx.switchToHttp().getRequest<Request>());
});
