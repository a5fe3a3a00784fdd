/**
 * Value Object representing the person who logged work
 */
export class Author {
  private constructor(
    private readonly _accountId: string,
    private readonly _displayName: string,
    private readonly _emailAddress?: string
  ) {
    if (!_accountId) {
      throw new Error('Author accountId is required');
    }
  }

  static create(accountId: string, displayName: string, emailAddress?: string): Author {
    return new Author(accountId, displayName || 'Unknown', emailAddress || undefined);
  }

  get accountId(): string {
    return this._accountId;
  }

  get displayName(): string {
    return this._displayName;
  }

  get emailAddress(): string | undefined {
    return this._emailAddress;
  }

  toJSON(): { accountId: string; displayName: string; emailAddress?: string } {
    return {
      accountId: this._accountId,
      displayName: this._displayName,
      emailAddress: this._emailAddress
    };
  }
}
