import { CalendarGateway } from '../../types/calendar';
import { GoogleCalendarAdapter, GoogleCalendarConfig } from './google.adapter';

export class CalendarFactory {
  static create(provider: string, config: GoogleCalendarConfig): CalendarGateway {
    switch (provider) {
      case 'google':
        return new GoogleCalendarAdapter(config);
      default:
        throw new Error(`Unsupported calendar provider: ${provider}`);
    }
  }
}
