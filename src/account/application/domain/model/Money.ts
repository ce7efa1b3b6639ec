/**
 * お金を表す値オブジェクト
 * 不変（immutable）で、金額の比較・加減算をカプセル化する
 *
 * 残高は浮動小数点数（number）で保持する。
 */
export class Money {
    public static readonly ZERO = Money.of(0);

    private constructor(private readonly amount: number) {}

    /**
     * 数値からMoneyインスタンスを生成
     *
     * NaN / Infinity は金額として扱えないためエラーにする。
     * 入力文字列の数値変換はアダプター側の責務。
     */
    static of(value: number): Money {
        if (!Number.isFinite(value)) {
            throw new Error(`Money amount must be a finite number: ${String(value)}`);
        }
        // -0 を 0 に正規化
        return new Money(value === 0 ? 0 : value);
    }

    /**
     * 金額が正の値かどうか
     */
    isPositive(): boolean {
        return this.amount > 0;
    }

    /**
     * 金額が負の値かどうか
     */
    isNegative(): boolean {
        return this.amount < 0;
    }

    /**
     * 他のMoneyより大きいかどうか
     */
    isGreaterThan(other: Money): boolean {
        return this.amount > other.amount;
    }

    /**
     * このMoneyに別のMoneyを加算
     */
    plus(other: Money): Money {
        return Money.of(this.amount + other.amount);
    }

    /**
     * このMoneyから別のMoneyを減算
     */
    minus(other: Money): Money {
        return Money.of(this.amount - other.amount);
    }

    getAmount(): number {
        return this.amount;
    }

    toString(): string {
        return this.amount.toString();
    }
}
