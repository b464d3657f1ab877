import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsString,
  IsNotEmpty,
  IsOptional,
  IsBoolean,
  IsInt,
  Min,
  Max,
  ArrayMinSize,
  ArrayMaxSize,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * DTO para resolución por lote.
 * Permite enviar hasta 50 empresas en una sola request.
 */
export class BatchResolveDto {
  @ApiProperty({
    description: 'Nombres de las empresas',
    type: [String],
    example: ['Natura Cosméticos S.A.', 'Embraer S.A.'],
  })
  @IsArray()
  @ArrayMinSize(1, { message: 'Mínimo 1 empresa' })
  @ArrayMaxSize(50, { message: 'Máximo 50 empresas por lote' })
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  @MaxLength(200, { each: true })
  @Transform(({ value }) =>
    Array.isArray(value) ? value.map((v: unknown) => (typeof v === 'string' ? v.trim() : v)) : value,
  )
  companies!: string[];

  @ApiPropertyOptional({ description: 'Enumerar también las filiales de cada CNPJ encontrado', default: false })
  @IsOptional()
  @IsBoolean()
  includeBranches?: boolean;

  @ApiPropertyOptional({ description: 'Empresas procesadas en paralelo', minimum: 1, maximum: 5, example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(5)
  concurrency?: number;
}
