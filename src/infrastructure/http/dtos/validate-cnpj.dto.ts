import { ApiProperty } from '@nestjs/swagger';
import { IsString, IsNotEmpty, MaxLength } from 'class-validator';

export class ValidateCnpjDto {
  @ApiProperty({ example: '11.222.333/0001-81' })
  @IsString()
  @IsNotEmpty({ message: 'El CNPJ es requerido' })
  @MaxLength(40)
  cnpj!: string;
}
