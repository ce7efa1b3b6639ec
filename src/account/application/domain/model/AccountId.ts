/**
 * アカウントID（値オブジェクト）
 *
 * 中身は不透明な文字列。空文字は許可しない。
 */
export class AccountId {
    constructor(private readonly value: string) {
        if (value.length === 0) {
            throw new Error('AccountId must not be empty');
        }
    }

    getValue(): string {
        return this.value;
    }

    equals(other: AccountId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}
