import {
  ApiError,
  activeClient,
  toIdentifier,
  type ApiResponse,
  type Identifiable,
  type Params,
  type RequestOptions,
} from '@restwell/request-core';
import { z } from 'zod';

export type ResourceId = string | number;

export interface ResourceData {
  id: ResourceId;
}

/** Per-call overrides forwarded to the executor. */
export type CallOptions = Omit<RequestOptions, 'params'>;

/**
 * Static side every concrete resource provides.
 */
export interface ResourceClass<R, D extends ResourceData> {
  new (data: D, response?: ApiResponse): R;
  readonly resourcePath: string;
  readonly schema: z.ZodType<D, z.ZodTypeDef, unknown>;
}

export interface ListObject<R> {
  data: R[];
  hasMore: boolean;
  response: ApiResponse;
}

const listEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
  has_more: z.boolean().default(false),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, response: ApiResponse): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ApiError(`Unexpected response object from API: ${issues.join('; ')}`, {
      httpStatus: response.httpStatus,
      httpHeaders: response.httpHeaders,
      httpBody: response.httpBody,
      jsonBody: response.data,
      response,
      cause: result.error,
    });
  }
  return result.data;
}

function instancePath(resourcePath: string, id: ResourceId): string {
  return `${resourcePath}/${encodeURIComponent(String(id))}`;
}

/**
 * Base class of API resources. Instances wrap validated response data and can
 * be passed as request params, where they are sent as their id.
 *
 * Every operation goes through the active client (see `ApiClient#request`).
 */
export abstract class ApiResource<D extends ResourceData> implements Identifiable {
  readonly data: D;
  /** Response this instance was decoded from. */
  readonly lastResponse?: ApiResponse;

  constructor(data: D, response?: ApiResponse) {
    this.data = data;
    this.lastResponse = response;
  }

  get id(): ResourceId {
    return this.data.id;
  }

  [toIdentifier](): ResourceId {
    return this.data.id;
  }

  toJSON(): D {
    return this.data;
  }

  static async retrieve<R, D extends ResourceData>(
    this: ResourceClass<R, D>,
    id: ResourceId,
    options: CallOptions = {},
  ): Promise<R> {
    const response = await activeClient().executeRequest('GET', instancePath(this.resourcePath, id), options);
    return new this(parseOrThrow(this.schema, response.data, response), response);
  }

  static async list<R, D extends ResourceData>(
    this: ResourceClass<R, D>,
    params: Params = {},
    options: CallOptions = {},
  ): Promise<ListObject<R>> {
    const response = await activeClient().executeRequest('GET', this.resourcePath, { ...options, params });
    const envelope = parseOrThrow(listEnvelopeSchema, response.data, response);
    return {
      data: envelope.data.map((item) => new this(parseOrThrow(this.schema, item, response), response)),
      hasMore: envelope.has_more,
      response,
    };
  }

  static async create<R, D extends ResourceData>(
    this: ResourceClass<R, D>,
    params: Params,
    options: CallOptions = {},
  ): Promise<R> {
    const response = await activeClient().executeRequest('POST', this.resourcePath, { ...options, params });
    return new this(parseOrThrow(this.schema, response.data, response), response);
  }

  static async update<R, D extends ResourceData>(
    this: ResourceClass<R, D>,
    id: ResourceId,
    params: Params,
    options: CallOptions = {},
  ): Promise<R> {
    const response = await activeClient().executeRequest('PATCH', instancePath(this.resourcePath, id), {
      ...options,
      params,
    });
    return new this(parseOrThrow(this.schema, response.data, response), response);
  }

  static async del<R, D extends ResourceData>(
    this: ResourceClass<R, D>,
    id: ResourceId,
    options: CallOptions = {},
  ): Promise<ApiResponse> {
    return activeClient().executeRequest('DELETE', instancePath(this.resourcePath, id), options);
  }
}
