import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsString, Matches, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class InitUploadDto {
    @ApiProperty({ type: 'string', description: 'First 16 hex chars of SHA-256("name:size:lastModified")', example: '3f2a9c0d41b7e865' })
    @IsString()
    @Matches(/^[0-9a-f]{16}$/, { message: 'fileSignature must be 16 lowercase hex characters' })
    fileSignature!: string;

    @ApiProperty({ type: 'string', description: 'Original file name', example: 'book.pdf' })
    @IsString()
    @IsNotEmpty()
    fileName!: string;

    @ApiProperty({ type: 'number', description: 'File size in bytes', example: 52428800 })
    @Type(() => Number)
    @IsInt()
    @Min(1)
    fileSize!: number;
}
