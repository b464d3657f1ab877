import { ApiProperty } from '@nestjs/swagger';
import { IsString, IsNotEmpty, MinLength, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * DTO para resolver el CNPJ principal de una empresa.
 */
export class ResolveCompanyDto {
  @ApiProperty({
    description: 'Nombre de la empresa (puede incluir S.A., Ltda., etc.)',
    example: 'Natura Cosméticos S.A.',
  })
  @IsString()
  @IsNotEmpty({ message: 'El nombre de la empresa es requerido' })
  @MinLength(2, { message: 'Nombre muy corto (mín. 2 caracteres)' })
  @MaxLength(200, { message: 'Nombre muy largo (máx. 200 caracteres)' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  q!: string;
}
