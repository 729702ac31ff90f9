import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

export class CreateDocumentDto {
    @IsString()
    @IsNotEmpty()
    objectKey!: string;

    // Defaults to the time of the request
    @IsOptional()
    @IsString()
    queuedTime?: string;

    @IsOptional()
    @IsInt()
    @Min(1)
    expiresAfter?: number;
}
