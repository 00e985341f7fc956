import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class InitUploadResponseDto {
    @ApiProperty({ description: 'Backend multipart upload id' })
    uploadId!: string;

    @ApiProperty({ description: 'Object key of the session', example: 'uploads/3f2a9c0d41b7e865/book.pdf' })
    key!: string;

    @ApiProperty({ description: 'Bytes per chunk for this session', example: 5242880 })
    chunkSize!: number;

    @ApiProperty({ example: 10 })
    totalChunks!: number;

    @ApiProperty({ description: 'Parts already stored by the backend', example: 5 })
    completedChunks!: number;

    @ApiProperty({ type: [Number], example: [1, 2, 3, 4, 5] })
    uploadedParts!: number[];

    @ApiProperty({ description: 'True when an existing session was adopted' })
    isResume!: boolean;
}

export class UploadChunkResponseDto {
    @ApiProperty({ example: 1 })
    partNumber!: number;

    @ApiProperty({ example: '"9e107d9d372bb6826bd81d3542a419d6"' })
    eTag!: string;

    @ApiProperty({ example: 5242880 })
    size!: number;
}

export class CompleteUploadResponseDto {
    @ApiProperty({ enum: ['completed', 'already_completed'] })
    status!: 'completed' | 'already_completed';

    @ApiProperty({ example: 'uploads/3f2a9c0d41b7e865/book.pdf' })
    key!: string;

    @ApiProperty({ example: '3f2a9c0d41b7e865' })
    signature!: string;

    @ApiProperty({ example: 'book.pdf' })
    fileName!: string;

    @ApiPropertyOptional()
    location?: string;
}

export class PendingUploadDto {
    @ApiProperty()
    uploadId!: string;

    @ApiProperty({ example: 'uploads/3f2a9c0d41b7e865/book.pdf' })
    key!: string;

    @ApiProperty({ example: '3f2a9c0d41b7e865' })
    signature!: string;

    @ApiProperty({ example: 'book.pdf' })
    fileName!: string;

    @ApiProperty({ example: 5242880 })
    chunkSize!: number;

    @ApiProperty({ example: 5 })
    completedChunks!: number;

    @ApiProperty({ example: 26214400 })
    bytesUploaded!: number;

    @ApiProperty({ type: String, nullable: true, example: '2024-07-29T10:00:00.000Z' })
    createdAt!: string | null;
}
