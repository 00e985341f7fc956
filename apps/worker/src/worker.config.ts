const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
};

export default () => ({
  worker: {
    env: process.env.NODE_ENV || 'dev',
    logger: process.env.WORKER_LOGGER || 'verbose',
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
    cleanup: {
      enabled: process.env.UPLOAD_CLEANUP_ENABLED !== 'false',
      intervalMinutes: toNumber(process.env.UPLOAD_CLEANUP_INTERVAL_MINUTES, 60),
      maxAgeHours: toNumber(process.env.UPLOAD_CLEANUP_MAX_AGE_HOURS, 24),
    },
  },
});
