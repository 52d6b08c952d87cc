import {describe, expect, it} from "vitest";
import {SystemClock} from "../../../../src/ledger/adapter/out/time/SystemClock";

describe("SystemClock", () => {
    // UTC 2024-03-31 23:30 は、ロンドン（BST）では 4/1 00:30
    const instant = new Date(Date.UTC(2024, 2, 31, 23, 30));

    it("タイムゾーンを指定するとその地域の日付を返す", () => {
        expect(new SystemClock("Europe/London", () => instant).today().toString()).toBe("2024-04-01");
        expect(new SystemClock("UTC", () => instant).today().toString()).toBe("2024-03-31");
    });

    it("タイムゾーン未指定ならローカル時刻の日付を返す", () => {
        // Arrange
        const local = new Date(2024, 0, 15, 9, 0);

        // Act & Assert
        expect(new SystemClock(undefined, () => local).today().toString()).toBe("2024-01-15");
    });
});
