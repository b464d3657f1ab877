import { ApiProperty } from '@nestjs/swagger';
import { IsString, IsNotEmpty, MaxLength, Matches } from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * DTO para enumerar filiales de un CNPJ ya conocido.
 */
export class BranchQueryDto {
  @ApiProperty({ description: 'Nombre de la empresa (define el slug del directorio)', example: 'Natura Cosméticos S.A.' })
  @IsString()
  @IsNotEmpty({ message: 'El nombre de la empresa es requerido' })
  @MaxLength(200)
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  name!: string;

  @ApiProperty({ description: 'CNPJ principal, con o sin puntuación', example: '11.222.333/0001-81' })
  @IsString()
  @Matches(/^[\d./\-\s]{14,20}$/, { message: 'CNPJ con formato inválido' })
  cnpj!: string;
}
