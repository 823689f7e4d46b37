import fs from 'node:fs';
import { v2 as cloudinary, type UploadApiErrorResponse, type UploadApiResponse } from 'cloudinary';
import { z } from 'zod';
import type { CloudinaryCredentials } from './config';
import type { ListedArtifact } from './types';

export interface CdnUploadResult {
  secureUrl: string;
  publicId: string;
  bytes: number;
}

export interface CdnBackend {
  upload(filePath: string, args: { folder: string; publicId: string }): Promise<CdnUploadResult>;
  search(folder: string, maxResults: number): Promise<ListedArtifact[]>;
}

const searchResultSchema = z.object({
  resources: z
    .array(
      z.object({
        public_id: z.string(),
        secure_url: z.string(),
        format: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        bytes: z.number().optional(),
        created_at: z.string().optional(),
        duration: z.number().nullable().optional(),
      })
    )
    .default([]),
});

export function toListedArtifacts(payload: unknown): ListedArtifact[] {
  const { resources } = searchResultSchema.parse(payload);
  return resources.map((resource) => {
    const base = resource.public_id.split('/').pop() || resource.public_id;
    return {
      uri: resource.secure_url,
      backend: 'CDN',
      bytesSize: resource.bytes ?? 0,
      filename: `${base}.${resource.format ?? 'mp4'}`,
      publicId: resource.public_id,
      format: resource.format,
      width: resource.width,
      height: resource.height,
      durationSec: resource.duration ?? undefined,
      createdAt: resource.created_at,
    };
  });
}

/**
 * Cloudinary-backed CDN. The SDK keeps credentials in module state, so this is
 * configured once at startup from the immutable server config.
 */
export function createCloudinaryBackend(credentials: CloudinaryCredentials): CdnBackend {
  cloudinary.config({
    cloud_name: credentials.cloudName,
    api_key: credentials.apiKey,
    api_secret: credentials.apiSecret,
    secure: true,
  });

  return {
    upload(filePath, { folder, publicId }) {
      return new Promise<CdnUploadResult>((resolve, reject) => {
        const uploadStream = cloudinary.uploader.upload_stream(
          {
            resource_type: 'video',
            folder,
            public_id: publicId,
            overwrite: true,
            invalidate: true,
          },
          (err?: UploadApiErrorResponse, result?: UploadApiResponse) => {
            if (err) return reject(new Error(`Cloudinary upload failed: ${err.message}`));
            if (!result?.secure_url) return reject(new Error('Cloudinary upload returned no URL.'));
            resolve({ secureUrl: result.secure_url, publicId: result.public_id, bytes: result.bytes });
          }
        );
        fs.createReadStream(filePath)
          .on('error', reject)
          .pipe(uploadStream);
      });
    },

    async search(folder, maxResults) {
      const payload: unknown = await cloudinary.search
        .expression(`resource_type:video AND folder:"${folder}"`)
        .sort_by('created_at', 'desc')
        .sort_by('public_id', 'asc')
        .max_results(maxResults)
        .execute();
      return toListedArtifacts(payload);
    },
  };
}
