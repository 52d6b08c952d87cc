import {createClient} from "@supabase/supabase-js";
import {beforeEach, describe, expect, it} from "vitest";
import {
    LIST_PAGE_SIZE,
    SupabaseLedgerPersistenceAdapter
} from "../../../../src/ledger/adapter/out/persistence/SupabaseLedgerPersistenceAdapter";
import {LedgerDataIntegrityException} from "../../../../src/ledger/application/domain/exception/LedgerDataIntegrityException";
import {StoreUnavailableException} from "../../../../src/ledger/application/domain/exception/StoreUnavailableException";
import {CalendarDate} from "../../../../src/ledger/application/domain/model/CalendarDate";
import {LedgerEntry, LedgerEntryId} from "../../../../src/ledger/application/domain/model/LedgerEntry";
import {Points} from "../../../../src/ledger/application/domain/model/Points";
import {FakePostgrest} from "../../../helpers/fakePostgrest";

/**
 * SupabaseLedgerPersistenceAdapter のテスト
 *
 * 【テスト戦略】
 * - 本物の supabase-js クライアントを使い、fetch だけを FakePostgrest に差し替える
 *   → クエリビルダーが組み立てる REST リクエストをそのまま検証できる
 * - ローカルの Supabase は起動しない
 */
describe("SupabaseLedgerPersistenceAdapter", () => {
    let postgrest: FakePostgrest;
    let adapter: SupabaseLedgerPersistenceAdapter;

    beforeEach(() => {
        postgrest = new FakePostgrest();
        const supabase = createClient("http://127.0.0.1:54321", "test-publishable-key", {
            auth: {persistSession: false},
            global: {fetch: postgrest.fetch},
        });
        adapter = new SupabaseLedgerPersistenceAdapter(supabase);
    });

    it("ensureSchema は points_log の件数だけを問い合わせる", async () => {
        // Act
        await adapter.ensureSchema();

        // Assert
        const [request] = postgrest.requests;
        expect(request.method).toBe("HEAD");
        expect(request.path).toBe("/rest/v1/points_log");
        expect(request.headers.get("prefer")).toContain("count=exact");
    });

    it("テーブルに到達できなければ ensureSchema は StoreUnavailableException", async () => {
        // Arrange
        postgrest.failWith = {status: 404, message: 'relation "points_log" does not exist'};

        // Act & Assert
        await expect(adapter.ensureSchema()).rejects.toThrow(StoreUnavailableException);
    });

    it("append は行を挿入し、採番された id を返す", async () => {
        // Arrange
        const entry = LedgerEntry.withoutId(
            CalendarDate.parse("2024-05-10"),
            "Child",
            "SPEND: Sweets",
            Points.of(-5),
            "Pick one sweet"
        );

        // Act
        const id = await adapter.append(entry);

        // Assert
        expect(id.getValue()).toBe(1);
        const [request] = postgrest.requests;
        expect(request.method).toBe("POST");
        expect(request.body).toEqual({
            entry_date: "2024-05-10",
            person: "Child",
            activity: "SPEND: Sweets",
            points: -5,
            notes: "Pick one sweet",
        });
    });

    it("list は日付降順 → id 降順で問い合わせ、行を変換する", async () => {
        // Arrange: PostgREST が並べ替えた結果を返す想定
        postgrest.rows = [
            {id: 2, entry_date: "2024-01-02", person: "Child", activity: "b", points: 3, notes: ""},
            {id: 3, entry_date: "2024-01-01", person: "Child", activity: "c", points: -1, notes: null},
            {id: 1, entry_date: "2024-01-01", person: "Child", activity: "a", points: 5, notes: "x"},
        ];

        // Act
        const entries = await adapter.list();

        // Assert
        expect(entries.map((e) => e.getId()?.getValue())).toEqual([2, 3, 1]);
        expect(entries[1].getNotes()).toBe("");
        const [request] = postgrest.requests;
        expect(request.method).toBe("GET");
        expect(request.params.get("order")).toBe("entry_date.desc,id.desc");
        expect(request.params.get("select")).toBe("id,entry_date,person,activity,points,notes");
        expect(request.params.get("offset")).toBe("0");
        expect(request.params.get("limit")).toBe(String(LIST_PAGE_SIZE));
    });

    it("list は max_rows を超える台帳もページを分けてすべて読む", async () => {
        // Arrange: id 2500 → 1 の降順（同じ日付）
        postgrest.rows = descendingRows(2500);

        // Act
        const entries = await adapter.list();

        // Assert
        expect(entries).toHaveLength(2500);
        expect(entries[0].getId()?.getValue()).toBe(2500);
        expect(entries[2499].getId()?.getValue()).toBe(1);
        const offsets = postgrest.requests.map((r) => r.params.get("offset"));
        expect(offsets).toEqual(["0", "1000", "2000", "2500"]);
    });

    it("サーバーの上限がページサイズより小さくても取りこぼさない", async () => {
        // Arrange
        postgrest.maxRows = 300;
        postgrest.rows = descendingRows(700);

        // Act
        const entries = await adapter.list();

        // Assert
        expect(entries).toHaveLength(700);
        const offsets = postgrest.requests.map((r) => r.params.get("offset"));
        expect(offsets).toEqual(["0", "300", "600", "700"]);
    });

    it("list で不正な行があれば LedgerDataIntegrityException", async () => {
        postgrest.rows = [
            {id: 1, entry_date: null, person: "Child", activity: "a", points: 5, notes: ""},
        ];

        await expect(adapter.list()).rejects.toThrow(LedgerDataIntegrityException);
    });

    it("deleteById は id で絞り込んで削除し、何度呼んでもエラーにならない", async () => {
        // Arrange
        const id = await adapter.append(
            LedgerEntry.withoutId(CalendarDate.parse("2024-05-10"), "Child", "Teeth", Points.of(3))
        );

        // Act
        await adapter.deleteById(id);
        await adapter.deleteById(id);
        await adapter.deleteById(new LedgerEntryId(999));

        // Assert
        expect(postgrest.rows).toEqual([]);
        const deletes = postgrest.requests.filter((r) => r.method === "DELETE");
        expect(deletes.map((r) => r.params.get("id"))).toEqual(["eq.1", "eq.1", "eq.999"]);
    });

    it("サーバーエラーは StoreUnavailableException として伝わる", async () => {
        // Arrange
        postgrest.failWith = {status: 503, message: "upstream down"};

        // Act & Assert
        await expect(adapter.list()).rejects.toThrow("Ledger store unavailable during list: upstream down");
    });

    it("ネットワーク断も StoreUnavailableException として伝わる", async () => {
        // Arrange
        postgrest.networkError = new TypeError("fetch failed");

        // Act & Assert
        await expect(adapter.list()).rejects.toMatchObject({
            name: "StoreUnavailableException",
            operation: "list",
        });
    });
});

function descendingRows(count: number): Record<string, unknown>[] {
    return Array.from({length: count}, (_, index) => ({
        id: count - index,
        entry_date: "2024-01-01",
        person: "Child",
        activity: "Teeth",
        points: 1,
        notes: "",
    }));
}
