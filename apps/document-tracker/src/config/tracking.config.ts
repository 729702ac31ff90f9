import { registerAs } from '@nestjs/config';
import { IsBoolean, IsInt, IsOptional, IsString, Max, Min, MinLength, validateSync } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { TrackingConfig } from './tracking-config.type';

class EnvironmentVariablesValidator {
    @IsString()
    @MinLength(3)
    DYNAMODB_TABLE_NAME: string = 'DocumentTracking';

    // Two-digit shard suffixes keep list partition keys fixed-width
    @IsInt()
    @Min(1)
    @Max(99)
    TRACKING_LIST_SHARD_COUNT: number = 6;

    @IsInt()
    @Min(0)
    DATA_RETENTION_IN_DAYS: number = 30;

    @IsInt()
    @Min(1)
    @Max(366)
    TRACKING_MAX_LIST_DAYS: number = 31;

    @IsBoolean()
    TRACKING_VALIDATE_USER_ID: boolean = true;

    @IsOptional()
    @IsString()
    @MinLength(16)
    TRACKING_OPERATOR_API_KEY?: string;
}

/**
 * Builds the tracking configuration from a set of environment variables.
 * Exported separately from the registered factory so it can be exercised
 * without touching process.env.
 */
export function loadTrackingConfig(env: NodeJS.ProcessEnv): TrackingConfig {
    const validatedConfig = plainToInstance(
        EnvironmentVariablesValidator,
        {
            DYNAMODB_TABLE_NAME: env.DYNAMODB_TABLE_NAME || 'DocumentTracking',
            TRACKING_LIST_SHARD_COUNT: env.TRACKING_LIST_SHARD_COUNT
                ? Number(env.TRACKING_LIST_SHARD_COUNT)
                : 6,
            DATA_RETENTION_IN_DAYS: env.DATA_RETENTION_IN_DAYS
                ? Number(env.DATA_RETENTION_IN_DAYS)
                : 30,
            TRACKING_MAX_LIST_DAYS: env.TRACKING_MAX_LIST_DAYS
                ? Number(env.TRACKING_MAX_LIST_DAYS)
                : 31,
            TRACKING_VALIDATE_USER_ID: env.TRACKING_VALIDATE_USER_ID !== 'false',
            TRACKING_OPERATOR_API_KEY: env.TRACKING_OPERATOR_API_KEY || undefined,
        },
        { enableImplicitConversion: true },
    );

    const errors = validateSync(validatedConfig, {
        skipMissingProperties: false,
    });

    if (errors.length > 0) {
        throw new Error(`Tracking config validation error: ${errors.toString()}`);
    }

    return {
        tableName: validatedConfig.DYNAMODB_TABLE_NAME,
        listShardCount: validatedConfig.TRACKING_LIST_SHARD_COUNT,
        retentionDays: validatedConfig.DATA_RETENTION_IN_DAYS,
        maxListDays: validatedConfig.TRACKING_MAX_LIST_DAYS,
        validateUserIdShape: validatedConfig.TRACKING_VALIDATE_USER_ID,
        ...(validatedConfig.TRACKING_OPERATOR_API_KEY !== undefined && {
            operatorApiKey: validatedConfig.TRACKING_OPERATOR_API_KEY,
        }),
    };
}

export default registerAs<TrackingConfig>('tracking', () => loadTrackingConfig(process.env));
