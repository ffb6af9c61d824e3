import { Module } from '@nestjs/common';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';
import { CommandRunner } from './internal/command.runner';

@Module({
  controllers: [StatusController],
  providers: [CommandRunner, StatusService],
  exports: [StatusService],
})
export class StatusModule {}
