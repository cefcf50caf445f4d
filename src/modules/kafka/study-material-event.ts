import { z } from 'zod';

/**
 * S3 event notification, as emitted by S3 and MinIO bucket notifications.
 */
export const studyMaterialEventSchema = z.object({
  Records: z
    .array(
      z.object({
        s3: z.object({
          bucket: z.object({ name: z.string().min(1) }),
          object: z.object({ key: z.string().min(1) }),
        }),
      }),
    )
    .min(1),
});

export type StudyMaterialEvent = z.infer<typeof studyMaterialEventSchema>;

export function buildStudyMaterialEvent(bucket: string, key: string): StudyMaterialEvent {
  return {
    Records: [{ s3: { bucket: { name: bucket }, object: { key: encodeObjectKey(key) } } }],
  };
}

/**
 * Object keys in S3 notifications are URL-encoded with `+` for spaces.
 */
export function decodeObjectKey(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, ' '));
}

export function encodeObjectKey(key: string): string {
  return encodeURIComponent(key).replace(/%20/g, '+').replace(/%2F/g, '/');
}
