import {describe, expect, it} from "vitest";
import {Points} from "../../src/ledger/application/domain/model/Points";
import {formatWorth, RewardCatalog} from "../../src/ledger/application/domain/model/RewardCatalog";

function reward(name: string, cost: number) {
    return {name, cost: Points.of(cost), notes: ""};
}

describe("RewardCatalog", () => {
    it("残高7なら A(5) は交換でき、次の目標は B(10)", () => {
        // Arrange
        const catalog = new RewardCatalog([reward("A", 5), reward("B", 10)]);

        // Act
        const result = catalog.checkAffordability(Points.of(7));

        // Assert
        expect(result.affordable.map((r) => r.name)).toEqual(["A"]);
        expect(result.locked.map((r) => r.name)).toEqual(["B"]);
        expect(result.nextReward?.reward.name).toBe("B");
        expect(result.nextReward?.pointsNeeded.getValue()).toBe(3);
        expect(result.nextReward?.progress).toBe(0.7);
    });

    it("コストちょうどの残高なら交換できる", () => {
        const catalog = new RewardCatalog([reward("A", 5)]);

        const result = catalog.checkAffordability(Points.of(5));

        expect(result.affordable.map((r) => r.name)).toEqual(["A"]);
        expect(result.nextReward).toBeNull();
    });

    it("同じコストの未達ご褒美は、先に宣言された方が次の目標になる", () => {
        // Arrange
        const catalog = new RewardCatalog([reward("Big", 20), reward("First", 10), reward("Second", 10)]);

        // Act
        const result = catalog.checkAffordability(Points.of(2));

        // Assert
        expect(result.nextReward?.reward.name).toBe("First");
    });

    it("残高が負なら進捗は0に丸められる", () => {
        const catalog = new RewardCatalog([reward("A", 5)]);

        const result = catalog.checkAffordability(Points.of(-3));

        expect(result.nextReward?.progress).toBe(0);
        expect(result.nextReward?.pointsNeeded.getValue()).toBe(8);
    });

    it("名前で検索できる", () => {
        const catalog = new RewardCatalog([reward("A", 5)]);

        expect(catalog.findByName("A")?.cost.getValue()).toBe(5);
        expect(catalog.findByName("Z")).toBeUndefined();
    });

    it("コスト0以下や重複した名前は拒否する", () => {
        expect(() => new RewardCatalog([reward("A", 0)])).toThrow("must cost at least 1 point");
        expect(() => new RewardCatalog([reward("A", 1), reward("A", 2)])).toThrow('Duplicate reward name: "A"');
    });
});

describe("formatWorth", () => {
    it("ポイントをポンド表記に換算する", () => {
        expect(formatWorth(Points.of(25), 0.1)).toBe("£2.50");
        expect(formatWorth(Points.ZERO, 0.1)).toBe("£0.00");
        expect(formatWorth(Points.of(-4), 0.1)).toBe("-£0.40");
    });
});
