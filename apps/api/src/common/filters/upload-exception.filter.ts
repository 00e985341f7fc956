import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ObjectStoreError } from '@files';
import { UploadError, UploadErrorCode } from '@uploads';

const STATUS_BY_CODE: Record<UploadErrorCode, HttpStatus> = {
    [UploadErrorCode.INVALID_ARGUMENT]: HttpStatus.BAD_REQUEST,
    [UploadErrorCode.MALFORMED_KEY]: HttpStatus.BAD_REQUEST,
    [UploadErrorCode.KEY_TOO_LONG]: HttpStatus.BAD_REQUEST,
    [UploadErrorCode.SESSION_NOT_FOUND]: HttpStatus.NOT_FOUND,
    [UploadErrorCode.EXPIRED_SESSION]: HttpStatus.GONE,
    [UploadErrorCode.CAPACITY_EXCEEDED]: HttpStatus.PAYLOAD_TOO_LARGE,
    [UploadErrorCode.COMPLETION_FAILED]: HttpStatus.CONFLICT,
    [UploadErrorCode.PART_UPLOAD_FAILED]: HttpStatus.BAD_GATEWAY,
    [UploadErrorCode.ABORT_FAILED]: HttpStatus.BAD_GATEWAY,
};

export interface UploadErrorBody {
    statusCode: number;
    error: string;
    message: string;
    timestamp: string;
}

/**
 * Translates upload-core and storage failures into HTTP responses.
 */
@Catch(UploadError, ObjectStoreError)
export class UploadExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(UploadExceptionFilter.name);

    catch(exception: UploadError | ObjectStoreError, host: ArgumentsHost): void {
        const response = host.switchToHttp().getResponse<Response>();

        let statusCode: HttpStatus;
        let error: string;
        if (exception instanceof UploadError) {
            statusCode = STATUS_BY_CODE[exception.code];
            error = exception.code;
        } else {
            statusCode = exception.kind === 'unavailable' ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.BAD_GATEWAY;
            error = 'STORAGE_ERROR';
        }

        if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
            this.logger.error(`${error}: ${exception.message}`, exception.stack);
        } else {
            this.logger.warn(`${error}: ${exception.message}`);
        }

        const body: UploadErrorBody = {
            statusCode,
            error,
            message: exception.message,
            timestamp: new Date().toISOString(),
        };
        response.status(statusCode).json(body);
    }
}
