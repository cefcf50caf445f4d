import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class PassageDto {
  @ApiProperty()
  text!: string;

  @ApiProperty({ description: 'Similarity to the question, higher is closer.' })
  score!: number;

  @ApiProperty({ description: 'Object key of the study material.' })
  source!: string;
}

export class AskResponseDto {
  @ApiProperty({ example: "IAM is AWS's identity and access management service." })
  answer!: string;

  @ApiPropertyOptional({ type: [PassageDto] })
  sources?: PassageDto[];
}

export class ErrorResponseDto {
  @ApiProperty({ example: 'ValidationError' })
  error!: string;

  @ApiProperty({ example: 'query must be non-empty' })
  message!: string;
}

export class MaterialUploadResponseDto {
  @ApiProperty({ example: 'accepted' })
  status!: 'accepted';

  @ApiProperty()
  bucket!: string;

  @ApiProperty({ example: 'materials/1718000000000-iam-notes.pdf' })
  key!: string;
}
