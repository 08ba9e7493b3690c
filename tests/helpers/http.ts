/**
 * In-process request and response objects for the Vercel handlers
 */

import { IncomingMessage, ServerResponse } from "http";
import { Socket } from "net";
import type { VercelRequest, VercelResponse } from "@vercel/node";

export function createRequest(
  method: string,
  query: Record<string, string | string[]> = {},
  headers: Record<string, string> = {}
): VercelRequest {
  const req = Object.assign(new IncomingMessage(new Socket()), {
    query,
    cookies: {},
    body: undefined,
  });
  req.method = method;
  req.headers = headers;
  return req;
}

export interface CapturedResponse {
  res: VercelResponse;
  status(): number;
  body(): unknown;
  header(name: string): string | number | string[] | undefined;
}

export function createResponse(): CapturedResponse {
  const raw = new ServerResponse(new IncomingMessage(new Socket()));
  let body: unknown;

  const res: VercelResponse = Object.assign(raw, {
    status(code: number) {
      raw.statusCode = code;
      return res;
    },
    json(value: unknown) {
      body = value;
      return res;
    },
    send(value: unknown) {
      body = value;
      return res;
    },
    redirect() {
      return res;
    },
  });

  return {
    res,
    status: () => raw.statusCode,
    body: () => body,
    header: (name) => raw.getHeader(name),
  };
}
