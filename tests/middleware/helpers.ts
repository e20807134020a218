import { Response } from 'express';

export interface RecordedResponse {
  statusCode?: number;
  body?: unknown;
}

/**
 * Minimal express Response that records status and JSON body
 */
export function createResponse(): { res: Response; recorded: RecordedResponse } {
  const recorded: RecordedResponse = {};
  const res: Partial<Response> = {};

  res.status = (code: number) => {
    recorded.statusCode = code;
    return res as Response;
  };
  res.json = (body: unknown) => {
    recorded.body = body;
    return res as Response;
  };

  return { res: res as Response, recorded };
}
