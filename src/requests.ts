import type { JsonObject } from './types.js';

/** One API call: the path below the endpoint and its (unauthenticated) body */
export interface ApiRequest {
  path: string;
  payload: Readonly<JsonObject>;
}

function seg(value: string): string {
  return encodeURIComponent(value);
}

export interface CreateRecordInput {
  name: string;
  type: string;
  content: string;
  ttl?: string;
  priority?: string;
}

/**
 * Build the create payload. Unset optionals are left out entirely: the
 * registrar treats an explicit null differently from an absent key.
 */
export function buildCreatePayload(input: CreateRecordInput): JsonObject {
  const payload: JsonObject = {
    name: input.name,
    type: input.type,
    content: input.content,
  };
  if (input.ttl !== undefined) payload.ttl = input.ttl;
  if (input.priority !== undefined) payload.prio = input.priority;
  return payload;
}

export const requests = {
  ping(): ApiRequest {
    return { path: '/ping/', payload: {} };
  },

  retrieveRecords(domain: string): ApiRequest {
    return { path: `/dns/retrieve/${seg(domain)}`, payload: {} };
  },

  retrieveRecord(domain: string, id: string): ApiRequest {
    return { path: `/dns/retrieve/${seg(domain)}/${seg(id)}`, payload: {} };
  },

  createRecord(domain: string, input: CreateRecordInput): ApiRequest {
    return { path: `/dns/create/${seg(domain)}`, payload: buildCreatePayload(input) };
  },

  deleteRecord(domain: string, id: string): ApiRequest {
    return { path: `/dns/delete/${seg(domain)}/${seg(id)}`, payload: {} };
  },

  retrieveSsl(domain: string): ApiRequest {
    return { path: `/ssl/retrieve/${seg(domain)}`, payload: {} };
  },
};
