const MiB = 1024 * 1024;
const GiB = 1024 * MiB;
const TiB = 1024 * GiB;

export const UPLOADS_PREFIX = 'uploads/';

export const DEFAULT_CHUNK_SIZE = 5 * MiB;
export const MAX_PART_SIZE = 5 * GiB;
export const MAX_PART_COUNT = 10_000;
export const MAX_OBJECT_SIZE = 5 * TiB;
export const MAX_KEY_LENGTH = 1024;

export const SIGNATURE_LENGTH = 16;
