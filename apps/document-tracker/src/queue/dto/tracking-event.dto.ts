import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsObject, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

import { DocumentStatus } from '../../database/models';

export enum TrackingEventType {
    DOCUMENT_UPLOADED = 'document.uploaded',
    STATUS_CHANGED = 'workflow.status-changed',
}

export class TrackingEventEnvelopeDto {
    @IsString()
    @IsNotEmpty()
    eventType!: string;

    @IsObject()
    data!: object;

    @IsOptional()
    @IsString()
    timestamp?: string;
}

/** Raw claims forwarded with an upload notification. */
export class EventIdentityDto {
    @IsOptional()
    @IsString()
    sub?: string;

    @IsOptional()
    @IsString()
    username?: string;
}

export class DocumentUploadedDataDto {
    @IsString()
    @IsNotEmpty()
    ObjectKey!: string;

    @IsString()
    @IsNotEmpty()
    QueuedTime!: string;

    // Owner already resolved upstream (e.g. taken from a users/<id>/ upload path)
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    UserId?: string;

    @IsOptional()
    @ValidateNested()
    @Type(() => EventIdentityDto)
    Identity?: EventIdentityDto;

    @IsOptional()
    @IsInt()
    @Min(1)
    ExpiresAfter?: number;
}

export class CompletionMetadataDto {
    @IsOptional()
    @IsString()
    WorkflowExecutionArn?: string;

    @IsOptional()
    @IsString()
    WorkflowStatus?: string;

    @IsOptional()
    @IsString()
    StartTime?: string;

    @IsOptional()
    @IsString()
    CompletionTime?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    PageCount?: number;

    @IsOptional()
    @IsString()
    ErrorMessage?: string;

    @IsOptional()
    @IsString()
    OutputUri?: string;
}

export class StatusChangedDataDto {
    @IsString()
    @IsNotEmpty()
    ObjectKey!: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    UserId?: string;

    @IsEnum(DocumentStatus)
    Status!: DocumentStatus;

    @IsOptional()
    @ValidateNested()
    @Type(() => CompletionMetadataDto)
    Metadata?: CompletionMetadataDto;
}
