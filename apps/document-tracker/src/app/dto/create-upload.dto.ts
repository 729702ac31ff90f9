import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateUploadDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    fileName!: string;

    /** Optional sub-folder below the caller's upload folder. */
    @IsOptional()
    @IsString()
    @MaxLength(512)
    prefix?: string;

    @IsOptional()
    @IsString()
    contentType?: string;
}

export class CompleteUploadDto {
    /** Key returned with the upload URL. */
    @IsString()
    @IsNotEmpty()
    @MaxLength(1024)
    objectKey!: string;
}
