import { Inject, Injectable } from '@nestjs/common';
import { ExchangeFacade } from './interfaces';
import { VenueHealth, VenueProfile } from './models';

export const VENUE_FACADES = Symbol('VENUE_FACADES');

@Injectable()
export class VenueRegistryService {
  constructor(
    @Inject(VENUE_FACADES)
    private readonly facades: ExchangeFacade[],
  ) {}

  getFacades(): readonly ExchangeFacade[] {
    return this.facades;
  }

  getFacade(venue: string): ExchangeFacade | undefined {
    return this.facades.find((facade) => facade.venue === venue);
  }

  getProfiles(): VenueProfile[] {
    return this.facades.map((facade) => facade.venueProfile());
  }

  getHealth(): VenueHealth[] {
    return this.facades.map((facade) => facade.getHealth());
  }
}
