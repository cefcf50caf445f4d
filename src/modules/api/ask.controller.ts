import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AskService } from '../rag/services/ask.service';
import { AskDto } from './dto/ask.dto';
import { AskResponseDto, ErrorResponseDto } from './dto/response.dto';

@ApiTags('ask')
@Controller()
export class AskController {
  constructor(private readonly askService: AskService) { }

  @Post('ask')
  @HttpCode(200)
  @ApiOperation({ summary: 'Ask a question', description: 'Answers a question from the indexed study material.' })
  @ApiResponse({ status: 200, type: AskResponseDto })
  @ApiResponse({ status: 400, description: 'ValidationError', type: ErrorResponseDto })
  @ApiResponse({ status: 502, description: 'RetrievalError or GenerationError', type: ErrorResponseDto })
  @ApiResponse({ status: 504, description: 'RetrievalError or GenerationError after a timeout', type: ErrorResponseDto })
  ask(@Body() askDto: AskDto): Promise<AskResponseDto> {
    return this.askService.ask(askDto);
  }
}
