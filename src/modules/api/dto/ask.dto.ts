import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class AskDto {
  @ApiProperty({ description: 'The question to answer from the study material.', example: 'What is IAM?' })
  @IsString({ message: 'query must be a string' })
  @IsNotEmpty({ message: 'query must be non-empty' })
  query!: string;

  @ApiPropertyOptional({ description: 'Return the passages the answer was generated from.', default: false })
  @IsOptional()
  @IsBoolean({ message: 'includeSources must be a boolean' })
  includeSources?: boolean;
}
