import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { DiscoveryLayer } from '../../../domain/enums/discovery-layer.enum';
import { ResolutionStatus } from '../../../domain/enums/resolution-status.enum';

// ──────────────────────────────────────────────────────────
// Response DTOs: solo para documentar la forma del JSON
// ──────────────────────────────────────────────────────────

export class ResolutionResponseDto {
  @ApiProperty({ example: 'Natura Cosméticos S.A.' })
  company!: string;

  @ApiProperty({ description: '"" si no se encontró', example: '11.222.333/0001-81' })
  cnpj!: string;

  @ApiProperty({ enum: ResolutionStatus, example: ResolutionStatus.SUCCESS })
  status!: ResolutionStatus;

  @ApiPropertyOptional({ enum: DiscoveryLayer, nullable: true })
  layer!: DiscoveryLayer | null;

  @ApiPropertyOptional({ example: 'https://natura.com.br/', nullable: true })
  sourceUrl!: string | null;

  @ApiProperty({ type: [String], example: ['11.222.333/0001-81'] })
  candidates!: string[];

  @ApiProperty({ example: false })
  headOfficeConfirmed!: boolean;

  @ApiProperty({ example: 'website: CNPJ encontrado en https://natura.com.br/' })
  notes!: string;

  @ApiProperty({ type: [String] })
  trail!: string[];

  @ApiProperty()
  timestamp!: string;
}

export class BranchEntryDto {
  @ApiProperty({ example: 'Filial' })
  label!: string;

  @ApiProperty({ example: '11.222.333/0002-62' })
  cnpj!: string;
}

export class BranchCrawlResponseDto {
  @ApiProperty()
  company!: string;

  @ApiProperty({ example: '11.222.333/0001-81' })
  primaryCnpj!: string;

  @ApiProperty()
  seedUrl!: string;

  @ApiProperty({ type: [BranchEntryDto] })
  entries!: BranchEntryDto[];

  @ApiProperty({ example: 3 })
  pagesVisited!: number;

  @ApiProperty({ type: [String] })
  failedPages!: string[];

  @ApiProperty({ example: 0 })
  discardedRows!: number;

  @ApiProperty({ example: false })
  cancelled!: boolean;
}

export class ResultRowDto {
  @ApiProperty()
  company!: string;

  @ApiProperty({ example: 'Matriz' })
  label!: string;

  @ApiProperty()
  cnpj!: string;

  @ApiProperty({ example: 'success' })
  status!: string;

  @ApiProperty()
  sourceUrl!: string;

  @ApiProperty()
  notes!: string;

  @ApiProperty()
  timestamp!: string;
}

export class BatchResponseDto {
  @ApiProperty({ example: 2 })
  total!: number;

  @ApiProperty({ example: 1 })
  success!: number;

  @ApiProperty({ example: 0 })
  multiple!: number;

  @ApiProperty({ example: 1 })
  notFound!: number;

  @ApiProperty({ example: 0 })
  errors!: number;

  @ApiProperty({ example: 4 })
  branches!: number;

  @ApiProperty({ example: false })
  cancelled!: boolean;

  @ApiProperty({ type: [ResultRowDto] })
  rows!: ResultRowDto[];
}

export class ValidateCnpjResponseDto {
  @ApiProperty({ example: '11.222.333/0001-81' })
  input!: string;

  @ApiProperty({ example: true })
  valid!: boolean;

  @ApiProperty({ example: '11222333000181' })
  digits!: string;

  @ApiPropertyOptional({ example: '11.222.333/0001-81', nullable: true })
  formatted!: string | null;
}
