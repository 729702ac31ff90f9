import { Injectable, Inject, Logger } from '@nestjs/common';
import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import { describeError } from '../database/tracking.errors';
import { buildUserObjectKey } from './user-object-key';

export interface PresignedUrlOptions {
    bucket: string;
    key: string;
    contentType?: string;
    expiresIn?: number; // seconds
}

export interface UploadUrlRequest {
    userId: string;
    fileName: string;
    prefix?: string;
    contentType?: string;
}

export interface UploadUrl {
    uploadUrl: string;
    bucket: string;
    objectKey: string;
    expiresIn: number;
    userId: string;
}

const DEFAULT_EXPIRES_IN = 900;

@Injectable()
export class S3Service {
    private readonly logger = new Logger(S3Service.name);
    private readonly uploadBucket: string;
    private readonly expiresIn: number;

    constructor(
        @Inject('S3_CLIENT')
        private readonly s3Client: S3Client,
    ) {
        this.uploadBucket = process.env.S3_BUCKET_NAME || 'document-tracker-uploads';
        this.expiresIn = Number(process.env.UPLOAD_URL_EXPIRES_IN) || DEFAULT_EXPIRES_IN;
    }

    /**
     * Issues an upload URL whose object key sits under the caller's own
     * `users/<userId>/` folder, so the upload notification can carry the
     * owner without trusting the client.
     */
    async createUploadUrl(request: UploadUrlRequest): Promise<UploadUrl> {
        const objectKey = buildUserObjectKey(request.userId, request.fileName, request.prefix);
        this.logger.log(`User-scoped upload path: ${objectKey}`);

        const uploadUrl = await this.getPresignedUploadUrl({
            bucket: this.uploadBucket,
            key: objectKey,
            contentType: request.contentType,
            expiresIn: this.expiresIn,
        });

        return {
            uploadUrl,
            bucket: this.uploadBucket,
            objectKey,
            expiresIn: this.expiresIn,
            userId: request.userId,
        };
    }

    /**
     * Generates a time-limited pre-signed URL that allows a client to upload a file directly to S3.
     */
    async getPresignedUploadUrl(options: PresignedUrlOptions): Promise<string> {
        const { bucket, key, contentType, expiresIn = DEFAULT_EXPIRES_IN } = options;

        try {
            const command = new PutObjectCommand({
                Bucket: bucket,
                Key: key,
                ContentType: contentType,
            });

            const url = await getSignedUrl(this.s3Client, command, { expiresIn });
            this.logger.log(`Generated presigned upload URL for: s3://${bucket}/${key}`);
            return url;
        } catch (error) {
            this.logger.error(
                `Failed to generate presigned upload URL: ${describeError(error)}`,
                error instanceof Error ? error.stack : undefined,
            );
            throw new Error(`Failed to generate presigned URL: ${describeError(error)}`);
        }
    }
}
