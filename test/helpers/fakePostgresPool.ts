import type {
    PostgresConnectionPool,
    PostgresQueryClient
} from "../../src/ledger/adapter/out/persistence/PostgresLedgerPersistenceAdapter";

export interface RecordedQuery {
    text: string;
    values: unknown[] | undefined;
}

/**
 * Postgres 接続プールのテスト用スタンドイン
 *
 * 実行された SQL と release の呼び出しを記録し、
 * 各クエリの結果は respond で決める。
 */
export class FakePostgresPool implements PostgresConnectionPool {
    readonly queries: RecordedQuery[] = [];
    readonly releases: (Error | boolean | undefined)[] = [];
    connectError: Error | null = null;

    constructor(
        private readonly respond: (text: string, values: unknown[] | undefined) => unknown[] = () => []
    ) {}

    async connect(): Promise<PostgresQueryClient> {
        if (this.connectError) {
            throw this.connectError;
        }
        return {
            query: async (text: string, values?: unknown[]) => {
                this.queries.push({text, values});
                return {rows: this.respond(text, values)};
            },
            release: (err?: Error | boolean) => {
                this.releases.push(err);
            },
        };
    }
}
