const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  app: {
    env: process.env.NODE_ENV || 'dev',
    port: toInt(process.env.API_PORT, 3000),
    host: process.env.API_HOST || '::',
    logger: process.env.API_LOGGER || 'verbose',
  },
  auth: {
    rootApiKey: process.env.API_ROOT_API_KEY,
  },
  storage: {
    driver: process.env.STORAGE_DRIVER || 's3',
  },
  s3: {
    accessKeyId: process.env.AWS_ACCESS_KEY_ID,
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    region: process.env.AWS_REGION,
    endpoint: process.env.AWS_ENDPOINT_URL,
    bucketName: process.env.AWS_S3_BUCKET_NAME,
    maxAttempts: toInt(process.env.AWS_MAX_ATTEMPTS, 3),
  },
  uploads: {
    defaultChunkSize: toInt(process.env.UPLOAD_DEFAULT_CHUNK_SIZE, 5 * 1024 * 1024),
    maxChunkBytes: toInt(process.env.UPLOAD_MAX_CHUNK_BYTES, 100 * 1024 * 1024),
  },
});
