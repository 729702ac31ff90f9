import trackingConfig, { loadTrackingConfig } from './tracking.config';

describe('tracking config', () => {
    it('should apply defaults when nothing is set', () => {
        expect(loadTrackingConfig({})).not.toHaveProperty('operatorApiKey');
        expect(loadTrackingConfig({})).toEqual({
            tableName: 'DocumentTracking',
            listShardCount: 6,
            retentionDays: 30,
            maxListDays: 31,
            validateUserIdShape: true,
        });
    });

    it('should read overrides from the environment', () => {
        const config = loadTrackingConfig({
            DYNAMODB_TABLE_NAME: 'TrackingTest',
            TRACKING_LIST_SHARD_COUNT: '12',
            DATA_RETENTION_IN_DAYS: '0',
            TRACKING_MAX_LIST_DAYS: '7',
            TRACKING_VALIDATE_USER_ID: 'false',
            TRACKING_OPERATOR_API_KEY: 'test-operator-key-0001',
        });

        expect(config).toEqual({
            tableName: 'TrackingTest',
            listShardCount: 12,
            retentionDays: 0,
            maxListDays: 7,
            validateUserIdShape: false,
            operatorApiKey: 'test-operator-key-0001',
        });
    });

    it('should reject a short operator key', () => {
        expect(() => loadTrackingConfig({ TRACKING_OPERATOR_API_KEY: 'short' })).toThrow(
            'Tracking config validation error',
        );
    });

    it('should reject a shard count outside the two-digit range', () => {
        expect(() => loadTrackingConfig({ TRACKING_LIST_SHARD_COUNT: '100' })).toThrow(
            'Tracking config validation error',
        );
    });

    it('should reject a non-numeric retention', () => {
        expect(() => loadTrackingConfig({ DATA_RETENTION_IN_DAYS: 'forever' })).toThrow(
            'Tracking config validation error',
        );
    });

    it('should register under the tracking namespace', () => {
        expect(trackingConfig.KEY).toBe('CONFIGURATION(tracking)');
    });
});
