import { Module } from '@nestjs/common';

import { ResponseSynthesizerService } from './response-synthesizer.service';

@Module({
  providers: [ResponseSynthesizerService],
  exports: [ResponseSynthesizerService],
})
export class ResponseModule {}
