export interface AwsClientOptions {
    region: string;
    endpoint?: string;
    credentials: {
        accessKeyId: string;
        secretAccessKey: string;
    };
}

/**
 * Connection settings shared by the DynamoDB, Kinesis and S3 clients.
 * AWS_ENDPOINT_URL points every client at LocalStack for local runs.
 */
export function awsClientOptions(env: NodeJS.ProcessEnv = process.env): AwsClientOptions {
    return {
        region: env.AWS_REGION || 'us-east-1',
        ...(env.AWS_ENDPOINT_URL && {
            endpoint: env.AWS_ENDPOINT_URL,
        }),
        credentials: {
            accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
            secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
        },
    };
}
