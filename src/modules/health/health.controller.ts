import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import { HealthResponseDto } from './dto/Health.response.dto';

@Controller('api/health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  public health(): HealthResponseDto {
    const r = this.healthService.check();
    return new HealthResponseDto({ timestamp: r.timestamp });
  }
}
