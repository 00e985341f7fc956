import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class UploadSessionRefDto {
    @ApiProperty({ type: 'string', description: 'Backend multipart upload id returned by init' })
    @IsString()
    @IsNotEmpty()
    uploadId!: string;

    @ApiProperty({ type: 'string', description: 'Object key returned by init', example: 'uploads/3f2a9c0d41b7e865/book.pdf' })
    @IsString()
    @IsNotEmpty()
    key!: string;
}
