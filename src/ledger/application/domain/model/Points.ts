/**
 * ポイントを表す値オブジェクト
 * 不変（immutable）で、符号付き整数のみを扱う
 *
 * - 正の値: 獲得（earn）
 * - 負の値: 消費（spend）
 * - 0: 合法だが意味を持たない
 */
/**
 * 1エントリに記録できるポイントの範囲（32ビット符号付き整数）
 *
 * 数千行の合計でも安全な整数の範囲に収まる。
 */
export const MIN_ENTRY_POINTS = -2147483648;
export const MAX_ENTRY_POINTS = 2147483647;

export class Points {
    public static readonly ZERO = new Points(0);

    private constructor(private readonly value: number) {}

    /**
     * 数値からPointsインスタンスを生成
     *
     * @throws RangeError 安全な整数でない場合（小数、NaN、Infinity など）
     */
    static of(value: number): Points {
        if (!Number.isSafeInteger(value)) {
            throw new RangeError(`Points must be a safe integer, got ${String(value)}`);
        }
        // -0 を 0 に正規化（equals と JSON 表現を安定させる）
        return new Points(value === 0 ? 0 : value);
    }

    isPositive(): boolean {
        return this.value > 0;
    }

    isNegative(): boolean {
        return this.value < 0;
    }

    isZero(): boolean {
        return this.value === 0;
    }

    isGreaterThan(other: Points): boolean {
        return this.value > other.value;
    }

    isGreaterThanOrEqualTo(other: Points): boolean {
        return this.value >= other.value;
    }

    /**
     * 2つのPointsを加算
     */
    static add(a: Points, b: Points): Points {
        return Points.of(a.value + b.value);
    }

    plus(other: Points): Points {
        return Points.add(this, other);
    }

    minus(other: Points): Points {
        return Points.of(this.value - other.value);
    }

    /**
     * 符号を反転
     *
     * ご褒美の交換では、コスト（正）を反転した値が台帳に記録される
     */
    negate(): Points {
        return Points.of(-this.value);
    }

    /**
     * 複数のPointsを合計する
     */
    static sum(values: Iterable<Points>): Points {
        let total = Points.ZERO;
        for (const value of values) {
            total = total.plus(value);
        }
        return total;
    }

    getValue(): number {
        return this.value;
    }

    equals(other: Points): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }

    /**
     * JSON表現（数値としてそのまま出力）
     */
    toJSON(): number {
        return this.value;
    }
}
