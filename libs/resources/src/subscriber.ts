import { z } from 'zod';
import { ApiResource } from './apiResource';

export const subscriberSchema = z
  .object({
    id: z.number().int(),
    email: z.string().nullish(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();

export type SubscriberData = z.infer<typeof subscriberSchema>;

export class Subscriber extends ApiResource<SubscriberData> {
  static readonly resourcePath = '/subscribers';
  static readonly schema = subscriberSchema;

  get fullName(): string {
    return [this.data.first_name, this.data.last_name].filter(Boolean).join(' ');
  }
}
