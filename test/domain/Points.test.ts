import {describe, expect, it} from "vitest";
import {Points} from "../../src/ledger/application/domain/model/Points";

describe("Points", () => {
    // ===== 生成 =====

    it("整数から生成できる", () => {
        // Arrange & Act
        const points = Points.of(5);

        // Assert
        expect(points.getValue()).toBe(5);
    });

    it("負の値も生成できる（消費）", () => {
        expect(Points.of(-3).getValue()).toBe(-3);
    });

    it("小数やNaNは生成できない", () => {
        expect(() => Points.of(1.5)).toThrow(RangeError);
        expect(() => Points.of(Number.NaN)).toThrow(RangeError);
        expect(() => Points.of(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });

    it("-0 は 0 に正規化される", () => {
        // Act
        const points = Points.of(-0);

        // Assert
        expect(Object.is(points.getValue(), 0)).toBe(true);
        expect(points.equals(Points.ZERO)).toBe(true);
    });

    // ===== 演算 =====

    it("加算・減算・符号反転ができる", () => {
        // Arrange
        const a = Points.of(10);
        const b = Points.of(4);

        // Act & Assert
        expect(a.plus(b).getValue()).toBe(14);
        expect(Points.add(a, b).getValue()).toBe(14);
        expect(a.minus(b).getValue()).toBe(6);
        expect(b.minus(a).getValue()).toBe(-6);
        expect(a.negate().getValue()).toBe(-10);
    });

    it("sumで合計できる（空なら0）", () => {
        expect(Points.sum([Points.of(5), Points.of(-3), Points.of(1)]).getValue()).toBe(3);
        expect(Points.sum([]).isZero()).toBe(true);
    });

    // ===== 比較 =====

    it("正負と大小を判定できる", () => {
        expect(Points.of(1).isPositive()).toBe(true);
        expect(Points.of(-1).isNegative()).toBe(true);
        expect(Points.ZERO.isPositive()).toBe(false);
        expect(Points.ZERO.isNegative()).toBe(false);

        expect(Points.of(7).isGreaterThan(Points.of(5))).toBe(true);
        expect(Points.of(5).isGreaterThan(Points.of(5))).toBe(false);
        expect(Points.of(5).isGreaterThanOrEqualTo(Points.of(5))).toBe(true);
    });

    it("JSONでは数値として出力される", () => {
        expect(JSON.stringify({points: Points.of(-4)})).toBe('{"points":-4}');
    });
});
