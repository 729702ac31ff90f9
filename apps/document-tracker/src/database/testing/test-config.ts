import { TrackingConfig } from '../../config/tracking-config.type';

export const testTrackingConfig: TrackingConfig = {
    tableName: 'DocumentTrackingTest',
    listShardCount: 6,
    retentionDays: 30,
    maxListDays: 31,
    validateUserIdShape: false,
};
