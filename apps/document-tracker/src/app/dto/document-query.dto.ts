import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';

import { ShardRange } from '../../database/list-index.service';

export class DocumentDetailQueryDto {
    @IsString()
    @IsNotEmpty()
    objectKey!: string;
}

export class DocumentListQueryDto {
    /** Start of the range, as a UTC timestamp or a plain YYYY-MM-DD date. */
    @IsString()
    @IsNotEmpty()
    from!: string;

    /** End of the range (inclusive); a plain date means the end of that day. */
    @IsString()
    @IsNotEmpty()
    to!: string;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    shardFrom?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    shardTo?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(1000)
    limit?: number = 100;

    /** `nextCursor` of the previous page. */
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    cursor?: string;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function shardRangeOf(query: DocumentListQueryDto): ShardRange | undefined {
    if (query.shardFrom === undefined && query.shardTo === undefined) {
        return undefined;
    }
    return { from: query.shardFrom ?? 0, to: query.shardTo ?? query.shardFrom ?? 0 };
}

export function rangeStart(value: string): string {
    return DATE_ONLY.test(value) ? `${value}T00:00:00Z` : value;
}

export function rangeEnd(value: string): string {
    return DATE_ONLY.test(value) ? `${value}T23:59:59Z` : value;
}
