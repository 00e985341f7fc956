import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, IsPositive } from 'class-validator';
import { Type } from 'class-transformer';

export class CleanupExpiredDto {
    @ApiProperty({ type: 'number', description: 'Abort sessions initiated more than this many hours ago', example: 24 })
    @Type(() => Number)
    @IsNumber()
    @IsPositive()
    maxAgeHours!: number;
}

export class CleanupExpiredResponseDto {
    @ApiProperty({ description: 'Number of sessions aborted', example: 3 })
    count!: number;
}
