export type SubmissionRecord = {
  readonly name: string;
  readonly status: string;
};

export type PollResponse = {
  readonly homeworks: ReadonlyArray<unknown>;
  readonly currentDate: number;
};

export type NotificationState = {
  lastMessage: string | null;
};

/**
 * Everything the poller carries from one cycle to the next. Created once at
 * startup and mutated only between cycles.
 */
export type PollerState = {
  cursor: number | null;
  readonly notification: NotificationState;
};

export type ValidationError =
  | { readonly kind: "MalformedBody" }
  | { readonly kind: "MalformedHomeworksField" }
  | { readonly kind: "MalformedCurrentDateField" };

export type ParseError =
  | { readonly kind: "MissingField"; readonly key: string }
  | { readonly kind: "UnknownStatus"; readonly code: string };

export type ValidationResult =
  | { readonly success: true; readonly response: PollResponse }
  | { readonly success: false; readonly error: ValidationError };

export type ParseResult =
  | {
      readonly success: true;
      readonly record: SubmissionRecord;
      readonly message: string;
    }
  | { readonly success: false; readonly error: ParseError };
