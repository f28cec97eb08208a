import { Module } from '@nestjs/common';

import { FLIGHT_SEARCH } from './interfaces';
import { SampleFlightSearchService } from './services';

@Module({
  providers: [
    SampleFlightSearchService,
    { provide: FLIGHT_SEARCH, useExisting: SampleFlightSearchService },
  ],
  exports: [FLIGHT_SEARCH],
})
export class FlightsModule {}
