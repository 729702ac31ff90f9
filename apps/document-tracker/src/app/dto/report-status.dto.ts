import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

import { CompletionMetadata, DocumentStatus } from '../../database/models';

export class WorkflowMetadataDto implements CompletionMetadata {
    @IsOptional()
    @IsString()
    workflowExecutionArn?: string;

    @IsOptional()
    @IsString()
    workflowStatus?: string;

    @IsOptional()
    @IsString()
    startTime?: string;

    @IsOptional()
    @IsString()
    completionTime?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    pageCount?: number;

    @IsOptional()
    @IsString()
    errorMessage?: string;

    @IsOptional()
    @IsString()
    outputUri?: string;
}

/** A workflow's status callback for one tracked document. */
export class ReportStatusDto {
    @IsString()
    @IsNotEmpty()
    objectKey!: string;

    // Owner the document was taken in with; absent for legacy documents
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    ownerId?: string;

    @IsEnum(DocumentStatus)
    status!: DocumentStatus;

    @IsOptional()
    @ValidateNested()
    @Type(() => WorkflowMetadataDto)
    metadata?: WorkflowMetadataDto;
}
