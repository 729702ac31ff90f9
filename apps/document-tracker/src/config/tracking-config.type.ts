export type TrackingConfig = {
    tableName: string;
    listShardCount: number;
    retentionDays: number; // 0 disables the default ExpiresAfter
    maxListDays: number;
    validateUserIdShape: boolean;
    operatorApiKey?: string; // unset disables the /operations endpoints
};
