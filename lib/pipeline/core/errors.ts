export type SlidesErrorCode =
  | "NO_SECTIONS_FOUND"
  | "CONFLICTING_SECTION_BODY"
  | "MALFORMED_ORDER_SPEC"
  | "SECTION_NOT_FOUND";

/**
 * Input-shape failures. Each one aborts the current song's run and carries
 * enough context for the user to fix the PDF or the order spec.
 */
export class SlidesError extends Error {
  readonly code: SlidesErrorCode;

  constructor(code: SlidesErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoSectionsFound extends SlidesError {
  constructor() {
    super(
      "NO_SECTIONS_FOUND",
      "No section labels found in the document (expected lines like [Verse 1], CHORUS or Bridge:)"
    );
  }
}

export class ConflictingSectionBody extends SlidesError {
  readonly label: string;

  constructor(label: string) {
    super(
      "CONFLICTING_SECTION_BODY",
      `Section "${label}" appears more than once with different lyrics`
    );
    this.label = label;
  }
}

export class MalformedOrderSpec extends SlidesError {
  readonly spec: string;
  readonly token: string;

  constructor(spec: string, token: string) {
    super(
      "MALFORMED_ORDER_SPEC",
      token === ""
        ? `Order "${spec}" contains an empty token`
        : `Order "${spec}" contains unknown token "${token}"`
    );
    this.spec = spec;
    this.token = token;
  }
}

export class SectionNotFound extends SlidesError {
  readonly token: string;

  constructor(token: string) {
    super(
      "SECTION_NOT_FOUND",
      `Order token "${token}" has no matching section in the document`
    );
    this.token = token;
  }
}
