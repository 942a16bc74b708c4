import { z } from 'zod';

/**
 * Text fields of the `POST /upload-video` multipart body. A repeated
 * `device_info` field keeps its last value.
 */
export const UploadVideoBodySchema = z.object({
  device_info: z.preprocess(
    (value) => (Array.isArray(value) ? value[value.length - 1] : value),
    z.string().optional(),
  ),
});

export type UploadVideoBodyDto = z.infer<typeof UploadVideoBodySchema>;

/**
 * Device info is best effort: a body that does not fit the schema is read
 * as having none.
 */
export function parseUploadVideoBody(body: unknown): UploadVideoBodyDto {
  const result = UploadVideoBodySchema.safeParse(body ?? {});
  return result.success ? result.data : {};
}
