import { STATUS_CODES } from "node:http";

import { toErrorMessage } from "../errors.js";

export type ClassifyRules = {
  upStatus: number;
  mustContain?: string;
  mustNotContain?: string;
};

export type ProbeResponse = {
  statusCode: number;
  body: { text(): Promise<string> };
};

export function describeStatus(statusCode: number) {
  const reason = STATUS_CODES[statusCode];
  return reason ? `${statusCode} ${reason}` : String(statusCode);
}

/**
 * Decides whether one response counts as up. Resolves to null on a pass,
 * or to a failure description; mismatches are never thrown.
 * The body is only read when a content rule is configured.
 */
export async function classifyResponse(response: ProbeResponse, rules: ClassifyRules): Promise<string | null> {
  if (response.statusCode !== rules.upStatus) {
    return `response status ${describeStatus(response.statusCode)}`;
  }

  if (!rules.mustContain && !rules.mustNotContain) {
    return null;
  }

  let body: string;
  try {
    body = await response.body.text();
  } catch (error) {
    return `reading response body: ${toErrorMessage(error)}`;
  }

  if (rules.mustContain && !body.includes(rules.mustContain)) {
    return `response does not contain '${rules.mustContain}'`;
  }
  if (rules.mustNotContain && body.includes(rules.mustNotContain)) {
    return `response contains '${rules.mustNotContain}'`;
  }

  return null;
}
