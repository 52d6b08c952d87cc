import {describe, expect, it} from "vitest";
import {InvalidLedgerInputException} from "../../../src/ledger/application/domain/exception/InvalidLedgerInputException";
import {CalendarDate} from "../../../src/ledger/application/domain/model/CalendarDate";
import {AdjustPointsCommand} from "../../../src/ledger/application/port/in/AdjustPointsCommand";
import {QuickEarnCommand} from "../../../src/ledger/application/port/in/QuickEarnCommand";
import {RedeemRewardCommand} from "../../../src/ledger/application/port/in/RedeemRewardCommand";

describe("AdjustPointsCommand", () => {
    it("activity の前後の空白を取り除く", () => {
        // Act
        const command = new AdjustPointsCommand("  Extra chores  ", 4);

        // Assert
        expect(command.activity).toBe("Extra chores");
        expect(command.points.getValue()).toBe(4);
        expect(command.entryDate).toBeNull();
        expect(command.notes).toBe("");
    });

    it("負の値（保護者による減算）も受け付ける", () => {
        const command = new AdjustPointsCommand("Broke a rule", -6, CalendarDate.parse("2024-03-01"), "talked about it");

        expect(command.points.getValue()).toBe(-6);
        expect(command.entryDate?.toString()).toBe("2024-03-01");
        expect(command.notes).toBe("talked about it");
    });

    it("空白だけの activity は拒否する", () => {
        expect(() => new AdjustPointsCommand("   ", 3)).toThrow(InvalidLedgerInputException);
        expect(() => new AdjustPointsCommand("   ", 3)).toThrow("Invalid activity: activity must not be blank");
    });

    it("0 ポイントは拒否する", () => {
        expect(() => new AdjustPointsCommand("Nothing", 0)).toThrow("Invalid points: points must not be zero");
    });

    it("32ビット整数の範囲を超えるポイントは拒否する", () => {
        // Act & Assert
        expect(() => new AdjustPointsCommand("Too much", 2147483648)).toThrow(
            "Invalid points: points must be at most 2147483647"
        );
        expect(() => new AdjustPointsCommand("Too little", -2147483649)).toThrow(
            "Invalid points: points must be at least -2147483648"
        );
        expect(new AdjustPointsCommand("Edge", 2147483647).points.getValue()).toBe(2147483647);
    });

    it("小数のポイントは拒否する", () => {
        expect(() => new AdjustPointsCommand("Half", 1.5)).toThrow(InvalidLedgerInputException);
    });
});

describe("QuickEarnCommand / RedeemRewardCommand", () => {
    it("空のラベルや名前は拒否する", () => {
        expect(() => new QuickEarnCommand("")).toThrow("Invalid label: label must not be empty");
        expect(() => new RedeemRewardCommand("")).toThrow("Invalid rewardName: reward name must not be empty");
    });

    it("値をそのまま保持する", () => {
        expect(new QuickEarnCommand("🦷 Teeth").label).toBe("🦷 Teeth");
        expect(new RedeemRewardCommand("🍬 Sweeties").rewardName).toBe("🍬 Sweeties");
    });
});
