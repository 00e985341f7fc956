import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseFilePipe, Post, UploadedFile, UseGuards, UseInterceptors } from "@nestjs/common";
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse, ApiSecurity, ApiTags } from "@nestjs/swagger";
import { FileInterceptor } from "@nestjs/platform-express";
import { QueryBus } from "@nestjs/cqrs";
import { ApiKeyGuard } from "../../../common/guards/api-key.guard";
import { UploadsService } from "../services/uploads.service";
import { InitUploadDto } from "../dto/init-upload.dto";
import { UploadChunkBodyDto, UploadChunkDto } from "../dto/upload-chunk.dto";
import { UploadSessionRefDto } from "../dto/upload-session-ref.dto";
import { CleanupExpiredDto, CleanupExpiredResponseDto } from "../dto/cleanup-expired.dto";
import {
    CompleteUploadResponseDto,
    InitUploadResponseDto,
    PendingUploadDto,
    UploadChunkResponseDto,
} from "../dto/upload-response.dto";
import { GetPendingUploadsQuery } from "../queries/get-pending-uploads.query";
import { GetUploadStatusQuery } from "../queries/get-upload-status.query";

@ApiTags('Uploads')
@ApiSecurity('api_key')
@UseGuards(ApiKeyGuard)
@Controller('uploads')
export class UploadsController {
    constructor(
        private readonly uploadsService: UploadsService,
        private readonly queryBus: QueryBus,
    ) { }

    @ApiOperation({
        summary: 'Start or resume an upload',
        description: 'Looks up an in-progress session for the file signature in object storage and resumes it, or opens a new one.',
    })
    @ApiResponse({ status: 200, type: InitUploadResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid signature, file name or size' })
    @ApiResponse({ status: 413, description: 'File exceeds the part-count or object-size limit' })
    @Post('init')
    @HttpCode(HttpStatus.OK)
    async init(@Body() body: InitUploadDto): Promise<InitUploadResponseDto> {
        return this.uploadsService.init(body.fileSignature, body.fileName, body.fileSize);
    }

    @ApiOperation({
        summary: 'Upload one chunk',
        description: 'Stores one part of the session. Re-sending a part number replaces the stored part, so a failed chunk is retried as-is.',
    })
    @ApiConsumes('multipart/form-data')
    @ApiBody({ type: UploadChunkDto })
    @ApiResponse({ status: 200, type: UploadChunkResponseDto })
    @ApiResponse({ status: 410, description: 'Session expired; call init again' })
    @ApiResponse({ status: 502, description: 'Storage rejected the chunk; retry it' })
    @Post('chunk')
    @HttpCode(HttpStatus.OK)
    @UseInterceptors(FileInterceptor('chunk'))
    async uploadChunk(
        @UploadedFile(new ParseFilePipe({ fileIsRequired: true })) chunk: Express.Multer.File,
        @Body() body: UploadChunkBodyDto,
    ): Promise<UploadChunkResponseDto> {
        return this.uploadsService.uploadChunk(body.uploadId, body.key, body.partNumber, chunk.buffer);
    }

    @ApiOperation({ summary: 'Complete an upload' })
    @ApiResponse({ status: 200, type: CompleteUploadResponseDto })
    @ApiResponse({ status: 404, description: 'Session not found and no object at the key' })
    @ApiResponse({ status: 409, description: 'Parts missing or rejected; session stays open' })
    @Post('complete')
    @HttpCode(HttpStatus.OK)
    async complete(@Body() body: UploadSessionRefDto): Promise<CompleteUploadResponseDto> {
        const result = await this.uploadsService.complete(body.uploadId, body.key);
        return {
            status: result.status,
            key: result.key,
            signature: result.signature,
            fileName: result.fileName,
            location: result.status === 'completed' ? result.location : undefined,
        };
    }

    @ApiOperation({ summary: 'Abort an upload' })
    @ApiResponse({ status: 204, description: 'Session aborted (or already gone)' })
    @Post('abort')
    @HttpCode(HttpStatus.NO_CONTENT)
    async abort(@Body() body: UploadSessionRefDto): Promise<void> {
        await this.uploadsService.abort(body.uploadId, body.key);
    }

    @ApiOperation({ summary: 'List in-progress uploads', description: 'Most recently started first.' })
    @ApiResponse({ status: 200, type: [PendingUploadDto] })
    @Get('pending')
    async listPending(): Promise<PendingUploadDto[]> {
        return this.queryBus.execute<GetPendingUploadsQuery, PendingUploadDto[]>(new GetPendingUploadsQuery());
    }

    @ApiOperation({ summary: 'Get upload status' })
    @ApiParam({ name: 'uploadId', type: String })
    @ApiResponse({ status: 200, type: PendingUploadDto })
    @ApiResponse({ status: 404, description: 'No in-progress session with this id' })
    @Get('status/:uploadId')
    async status(@Param('uploadId') uploadId: string): Promise<PendingUploadDto> {
        return this.queryBus.execute<GetUploadStatusQuery, PendingUploadDto>(new GetUploadStatusQuery(uploadId));
    }

    @ApiOperation({ summary: 'Abort sessions older than maxAgeHours' })
    @ApiResponse({ status: 200, type: CleanupExpiredResponseDto })
    @Post('cleanup')
    @HttpCode(HttpStatus.OK)
    async cleanupExpired(@Body() body: CleanupExpiredDto): Promise<CleanupExpiredResponseDto> {
        const count = await this.uploadsService.cleanupExpired(body.maxAgeHours);
        return { count };
    }
}
