import { DateTime } from 'luxon';
import { z } from 'zod';
import { BookingConfig } from '../config/booking';
import { QualificationField, UserInfo, UserInfoDraft } from '../types/booking';
import { TimeWindow } from '../types/calendar';
import { ExtractedFields, FieldIssue } from '../types/conversation';
import { logger } from '../utils/logger';
import { resolveTimePreference } from '../utils/timePreference';

const FIELD_ORDER: QualificationField[] = ['name', 'email', 'timePreference'];

const MAX_NAME_LENGTH = 100;

const emailSchema = z.string().trim().toLowerCase().email();

export interface QualificationUpdate {
  userInfo: UserInfoDraft;
  /** Window resolved from the accepted time preference, when one was accepted this turn. */
  window: TimeWindow | null;
  /** Fields whose stored value changed. */
  changed: QualificationField[];
  issues: FieldIssue[];
}

export class QualificationService {
  constructor(private config: BookingConfig) {}

  /**
   * Validates newly extracted fields and merges the valid ones into a copy of
   * `current`. Invalid values are reported and never stored.
   */
  merge(current: UserInfoDraft, fields: ExtractedFields, now: DateTime): QualificationUpdate {
    const userInfo: UserInfoDraft = { ...current };
    const changed: QualificationField[] = [];
    const issues: FieldIssue[] = [];
    let window: TimeWindow | null = null;

    if (fields.name != null) {
      const name = fields.name.replace(/\s+/g, ' ').trim();
      if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
        issues.push({ field: 'name', message: 'I need a name to put on the invitation.' });
      } else if (name !== current.name) {
        userInfo.name = name;
        changed.push('name');
      }
    }

    if (fields.email != null) {
      const parsed = emailSchema.safeParse(fields.email);
      if (!parsed.success) {
        issues.push({
          field: 'email',
          message: `"${fields.email.trim()}" doesn't look like a valid email address.`,
        });
      } else if (parsed.data !== current.email) {
        userInfo.email = parsed.data;
        changed.push('email');
      }
    }

    if (fields.timePreference != null && fields.timePreference.trim().length > 0) {
      const text = fields.timePreference.trim();
      const resolved = resolveTimePreference(text, {
        timezone: this.config.timezone,
        now,
        hours: this.config.businessHours,
      });

      if (resolved.ok) {
        userInfo.timePreference = text;
        window = resolved.window;
        changed.push('timePreference');
      } else if (resolved.reason === 'past') {
        issues.push({ field: 'timePreference', message: `"${text}" has already passed.` });
      } else {
        issues.push({
          field: 'timePreference',
          message: `I couldn't work out a time from "${text}".`,
        });
      }
    }

    if (changed.length > 0 || issues.length > 0) {
      logger.debug('Qualification fields merged', {
        changed,
        issues: issues.map((issue) => issue.field),
      });
    }

    return { userInfo, window, changed, issues };
  }

  missingFields(userInfo: UserInfoDraft): QualificationField[] {
    return FIELD_ORDER.filter((field) => !userInfo[field]);
  }

  /** The complete UserInfo, or null while any field is missing. */
  complete(userInfo: UserInfoDraft): UserInfo | null {
    const { name, email, timePreference } = userInfo;
    if (!name || !email || !timePreference) return null;
    return { name, email, timePreference };
  }
}
