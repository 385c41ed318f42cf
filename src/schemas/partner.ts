import { z } from 'zod';

export const PartnerRecord = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().min(1),
  city: z.string().min(1),
  country: z.string().min(1),
});
export type PartnerRecordT = z.output<typeof PartnerRecord>;

// Remote directory: POST {base}/search -> PartnerRecord[]
export const PartnerSearchRequest = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive(),
});
export type PartnerSearchRequestT = z.infer<typeof PartnerSearchRequest>;

export const PartnerSearchResponse = z.array(PartnerRecord);
