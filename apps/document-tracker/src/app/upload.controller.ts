import {
    Body,
    Controller,
    ForbiddenException,
    HttpCode,
    HttpStatus,
    Logger,
    Post,
    UnauthorizedException,
} from '@nestjs/common';

import { toQueuedTime } from '../database/models';
import { IdentityClaims } from '../identity/identity-claims';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import { DocumentUploadedDataDto } from '../queue/dto/tracking-event.dto';
import { KinesisService } from '../queue/kinesis.service';
import { S3Service, UploadUrl } from '../storage/s3.service';
import { userIdFromObjectKey } from '../storage/user-object-key';
import { AuthClaims } from './auth-claims.decorator';
import { CompleteUploadDto, CreateUploadDto } from './dto/create-upload.dto';

@Controller('uploads')
export class UploadController {
    private readonly logger = new Logger(UploadController.name);

    constructor(
        private readonly s3Service: S3Service,
        private readonly kinesisService: KinesisService,
        private readonly identityResolver: IdentityResolverService,
    ) { }

    /**
     * Issues a presigned upload URL scoped to the caller's folder. Anonymous
     * uploads are refused: the folder is what later ties the document to
     * its owner.
     */
    @Post()
    @HttpCode(HttpStatus.CREATED)
    async createUploadUrl(@Body() dto: CreateUploadDto, @AuthClaims() claims: IdentityClaims): Promise<UploadUrl> {
        const userId = this.identityResolver.resolve(claims);
        if (userId === null) {
            throw new UnauthorizedException('Uploads require an authenticated user');
        }

        const upload = await this.s3Service.createUploadUrl({
            userId,
            fileName: dto.fileName,
            prefix: dto.prefix,
            contentType: dto.contentType,
        });
        this.logger.log(`Issued upload URL for ${upload.objectKey}`);
        return upload;
    }

    /**
     * Announces a finished upload. The document is taken in by the stream
     * consumer, queued at the time of this call.
     */
    @Post('complete')
    @HttpCode(HttpStatus.ACCEPTED)
    async completeUpload(
        @Body() dto: CompleteUploadDto,
        @AuthClaims() claims: IdentityClaims,
    ): Promise<DocumentUploadedDataDto> {
        const userId = this.identityResolver.resolve(claims);
        if (userId === null) {
            throw new UnauthorizedException('Uploads require an authenticated user');
        }
        if (userIdFromObjectKey(dto.objectKey) !== userId) {
            throw new ForbiddenException(`Upload is outside the caller's folder: ${dto.objectKey}`);
        }

        return this.kinesisService.publishDocumentUploadEvent(dto.objectKey, toQueuedTime(new Date()), {
            identity: { sub: claims.stableId, username: claims.displayName },
        });
    }
}
