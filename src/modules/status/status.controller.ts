import { Controller, Get } from '@nestjs/common';
import { StatusService } from './status.service';
import { StatusReportResponseDto } from './dto/StatusReport.response.dto';

@Controller('api/status')
export class StatusController {
  public constructor(private readonly statusService: StatusService) {}

  @Get()
  public async status(): Promise<StatusReportResponseDto> {
    const report = await this.statusService.buildReport();
    return new StatusReportResponseDto(report);
  }
}
