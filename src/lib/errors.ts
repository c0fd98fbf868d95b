export class BotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No item in the upstream feed is dated today */
export class NotFoundError extends BotError {}

/** An event's text does not start with a year */
export class MalformedEntryError extends BotError {
  constructor(message: string, readonly text: string) {
    super(message);
  }
}

/** Missing credential or a bad CLI argument */
export class ConfigurationError extends BotError {}

/** A schedule index (or --item override) points past the parsed events */
export class ScheduleRangeError extends BotError {
  constructor(readonly index: number, readonly entryCount: number) {
    super(`Item index ${index} out of range: feed entry has ${entryCount} events`);
  }
}
