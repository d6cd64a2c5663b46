import { Body, Controller, Get, Put } from '@nestjs/common';
import { RecordPlaybackDto, RecordSearchDto } from './dto/history.dto';
import { HistoryService } from './history.service';

@Controller('history')
export class HistoryController {
  constructor(private readonly historyService: HistoryService) {}

  @Get()
  get() {
    return this.historyService.get();
  }

  @Put('search')
  async recordSearch(@Body() body: RecordSearchDto) {
    return this.historyService.recordSearch(body.query, body.selected);
  }

  @Put('playback')
  async recordPlayback(@Body() body: RecordPlaybackDto) {
    return this.historyService.recordPlayback(body.audiobook, body.chapterIndex);
  }
}
