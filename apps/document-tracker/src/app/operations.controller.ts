import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Post, Query, UseGuards } from '@nestjs/common';

import { ownerFromId } from '../database/models';
import { KinesisService } from '../queue/kinesis.service';
import { DocumentLifecycleService } from '../tracking/document-lifecycle.service';
import { collectPage, decodeListCursor } from './document-page';
import { DocumentListQueryDto, rangeEnd, rangeStart, shardRangeOf } from './dto/document-query.dto';
import { DocumentPageResponseDto } from './dto/document-response.dto';
import { ReportStatusDto } from './dto/report-status.dto';
import { OperatorApiKeyGuard } from './operator-api-key.guard';

/**
 * Endpoints for operators and the workflow engine rather than end users.
 */
@Controller('operations')
@UseGuards(OperatorApiKeyGuard)
export class OperationsController {
    private readonly logger = new Logger(OperationsController.name);

    constructor(
        private readonly documentLifecycleService: DocumentLifecycleService,
        private readonly kinesisService: KinesisService,
    ) { }

    /**
     * Lists every owner's documents in a time range, including legacy
     * documents that scoped listings never show.
     */
    @Get('documents')
    async listAll(@Query() query: DocumentListQueryDto): Promise<DocumentPageResponseDto> {
        const page = await collectPage(
            this.documentLifecycleService.listAllDocuments(
                { from: rangeStart(query.from), to: rangeEnd(query.to) },
                shardRangeOf(query),
                query.cursor === undefined ? undefined : decodeListCursor(query.cursor),
            ),
            query.limit ?? 100,
        );

        this.logger.log(`Listed ${page.items.length} document(s) across owners${page.truncated ? ' (truncated)' : ''}`);
        return page;
    }

    /**
     * Queues a workflow status change. The consumer applies it, so the
     * response only confirms the event was published.
     */
    @Post('documents/status')
    @HttpCode(HttpStatus.ACCEPTED)
    async reportStatus(@Body() dto: ReportStatusDto): Promise<void> {
        await this.kinesisService.publishStatusChangedEvent(
            dto.objectKey,
            ownerFromId(dto.ownerId),
            dto.status,
            dto.metadata,
        );
        this.logger.log(`Queued status ${dto.status} for ${dto.objectKey}`);
    }
}
