import { Controller, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MaterialUploadResponseDto, ErrorResponseDto } from './dto/response.dto';
import { MaterialsService } from './materials.service';

@ApiTags('materials')
@Controller('materials')
export class MaterialsController {
  constructor(private readonly materialsService: MaterialsService) { }

  @Post()
  @HttpCode(202)
  @UseInterceptors(FileInterceptor('file'))
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Upload study material',
    description: 'Stores a PDF, DOCX, TXT or Markdown file and queues it for indexing.',
  })
  @ApiBody({
    schema: {
      type: 'object',
      properties: { file: { type: 'string', format: 'binary' } },
      required: ['file'],
    },
  })
  @ApiResponse({ status: 202, type: MaterialUploadResponseDto })
  @ApiResponse({ status: 400, description: 'ValidationError', type: ErrorResponseDto })
  upload(@UploadedFile() file: Express.Multer.File | undefined): Promise<MaterialUploadResponseDto> {
    return this.materialsService.upload(file);
  }
}
