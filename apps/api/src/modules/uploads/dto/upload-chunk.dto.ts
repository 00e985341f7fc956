import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { UploadSessionRefDto } from './upload-session-ref.dto';

export class UploadChunkBodyDto extends UploadSessionRefDto {
    @ApiProperty({ type: 'number', description: 'Part number (1-based)', example: 1 })
    @Type(() => Number)
    @IsInt()
    @Min(1)
    partNumber!: number;
}

export class UploadChunkDto extends UploadChunkBodyDto {
    @ApiProperty({ type: 'string', format: 'binary', description: 'Chunk bytes' })
    chunk!: Express.Multer.File;
}
