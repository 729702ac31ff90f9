import {
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Logger,
    Post,
    Query,
    UnauthorizedException,
} from '@nestjs/common';

import { toQueuedTime } from '../database/models';
import { IdentityClaims } from '../identity/identity-claims';
import { IdentityResolverService } from '../identity/identity-resolver.service';
import { DocumentLifecycleService, IntakeResult } from '../tracking/document-lifecycle.service';
import { AuthClaims } from './auth-claims.decorator';
import { collectPage, decodeListCursor } from './document-page';
import { CreateDocumentDto } from './dto/create-document.dto';
import {
    DocumentDetailQueryDto,
    DocumentListQueryDto,
    rangeEnd,
    rangeStart,
    shardRangeOf,
} from './dto/document-query.dto';
import { DocumentPageResponseDto, DocumentResponseDto, toDocumentResponse } from './dto/document-response.dto';

@Controller('documents')
export class DocumentsController {
    private readonly logger = new Logger(DocumentsController.name);

    constructor(
        private readonly documentLifecycleService: DocumentLifecycleService,
        private readonly identityResolver: IdentityResolverService,
    ) { }

    @Post()
    @HttpCode(HttpStatus.CREATED)
    async create(@Body() dto: CreateDocumentDto, @AuthClaims() claims: IdentityClaims): Promise<IntakeResult> {
        return this.documentLifecycleService.intake({
            objectKey: dto.objectKey,
            queuedTime: dto.queuedTime ?? toQueuedTime(new Date()),
            identity: claims,
            expiresAfter: dto.expiresAfter,
        });
    }

    /**
     * Looks a document up under the caller's identity. Documents taken in
     * without identity are only visible to unauthenticated callers.
     */
    @Get('detail')
    async detail(
        @Query() query: DocumentDetailQueryDto,
        @AuthClaims() claims: IdentityClaims,
    ): Promise<DocumentResponseDto> {
        const owner = this.identityResolver.resolveOwner(claims);
        const record = await this.documentLifecycleService.fetch(query.objectKey, owner);
        return toDocumentResponse(record);
    }

    /**
     * Lists the caller's documents oldest first. A truncated page carries
     * `nextCursor`; send it back as `cursor` for the next page.
     */
    @Get()
    async list(
        @Query() query: DocumentListQueryDto,
        @AuthClaims() claims: IdentityClaims,
    ): Promise<DocumentPageResponseDto> {
        const ownerId = this.identityResolver.resolve(claims);
        if (ownerId === null) {
            throw new UnauthorizedException('Listing documents requires an authenticated user');
        }

        const page = await collectPage(
            this.documentLifecycleService.listDocuments(
                ownerId,
                { from: rangeStart(query.from), to: rangeEnd(query.to) },
                shardRangeOf(query),
                query.cursor === undefined ? undefined : decodeListCursor(query.cursor),
            ),
            query.limit ?? 100,
        );

        this.logger.log(
            `Listed ${page.items.length} document(s) for ${ownerId}${page.truncated ? ' (truncated)' : ''}`,
        );
        return page;
    }
}
