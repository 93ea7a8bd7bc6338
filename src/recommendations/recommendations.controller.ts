import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { RecommendationDto } from './dto/recommendation.dto';
import { RecommendationsService } from './recommendations.service';

@Controller('recommendations')
export class RecommendationsController {
  constructor(private readonly recommendationsService: RecommendationsService) {}

  @Post()
  @HttpCode(200)
  async recommend(@Body() dto: RecommendationDto) {
    return this.recommendationsService.recommend(dto);
  }
}
