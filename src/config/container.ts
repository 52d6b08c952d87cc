/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（Symbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 *
 * アプリケーション層は Port（インターフェース）にしか依存しない。
 * どのアダプターを注入するかは、ここで LEDGER_STORE に応じて決める。
 */

import 'reflect-metadata';
import {createClient} from '@supabase/supabase-js';
import {Pool} from 'pg';
import {container} from 'tsyringe';
import type {InjectionToken} from 'tsyringe';
import {InMemoryLedgerPersistenceAdapter} from '../ledger/adapter/out/persistence/InMemoryLedgerPersistenceAdapter';
import {PostgresLedgerPersistenceAdapter} from '../ledger/adapter/out/persistence/PostgresLedgerPersistenceAdapter';
import type {PostgresConnectionPool} from '../ledger/adapter/out/persistence/PostgresLedgerPersistenceAdapter';
import {SupabaseLedgerPersistenceAdapter} from '../ledger/adapter/out/persistence/SupabaseLedgerPersistenceAdapter';
import {SystemClock} from '../ledger/adapter/out/time/SystemClock';
import {PointsBankPropertiesToken} from '../ledger/application/domain/service/PointsBankProperties';
import {GetPointsSummaryQueryToken} from '../ledger/application/port/in/GetPointsSummaryQuery';
import {RecordPointsUseCaseToken} from '../ledger/application/port/in/RecordPointsUseCase';
import {AppendLedgerEntryPortToken} from '../ledger/application/port/out/AppendLedgerEntryPort';
import {ClockToken} from '../ledger/application/port/out/Clock';
import {DeleteLedgerEntryPortToken} from '../ledger/application/port/out/DeleteLedgerEntryPort';
import {InitializeLedgerStorePortToken} from '../ledger/application/port/out/InitializeLedgerStorePort';
import {LoadLedgerEntriesPortToken} from '../ledger/application/port/out/LoadLedgerEntriesPort';
import {PointsLedgerApplicationService} from '../ledger/application/service/PointsLedgerApplicationService';
import {PointsSummaryQueryService} from '../ledger/application/service/PointsSummaryQueryService';
import type {AppEnv} from './env';
import {readPointsBankConfig, toPointsBankProperties} from './points-bank-config';
import type {LedgerSupabaseClient} from './types';
import {AppEnvToken, PostgresPoolToken, SupabaseClientToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

// プロセスが所有する接続プール（終了時に閉じる）
let ownedPool: Pool | null = null;

/**
 * 台帳アダプターを全ての出力ポートに紐付ける
 *
 * 1つのアダプターが4つのPortを実装しているので、useToken で同じシングルトンを共有する。
 */
function bindLedgerPorts<T>(adapter: InjectionToken<T>): void {
    container.registerSingleton(adapter, adapter);

    for (const token of [
        AppendLedgerEntryPortToken,
        LoadLedgerEntriesPortToken,
        DeleteLedgerEntryPortToken,
        InitializeLedgerStorePortToken,
    ]) {
        container.register(token, {useToken: adapter});
    }
}

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定（環境変数・ご褒美カタログ）の登録
 * 2. 永続化アダプター（InMemory / Postgres / Supabase）の登録
 * 3. Clock の登録
 * 4. アプリケーションサービス（UseCase実装）の登録
 */
export function setupContainer(env: AppEnv): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定の登録
    // ========================================
    container.register(AppEnvToken, {useValue: env});

    const properties = toPointsBankProperties(
        readPointsBankConfig(env.POINTS_BANK_CONFIG),
        env.PARENT_PIN
    );
    container.register(PointsBankPropertiesToken, {useValue: properties});

    // ========================================
    // 2. 出力アダプター（永続化層）の登録
    // ========================================
    switch (env.LEDGER_STORE) {
        case 'postgres': {
            console.log('📦 Using Postgres adapter');

            /**
             * 接続プールはプロセス全体で1つ。容量は1に固定（単一ユーザー前提）
             * sslmode=require 相当: 暗号化はするが証明書は検証しない
             */
            const pool = new Pool({
                connectionString: env.SUPABASE_DB_URL,
                max: 1,
                ssl: env.DATABASE_SSL === 'require' ? {rejectUnauthorized: false} : false,
            });
            pool.on('error', (error) => {
                console.error('❌ Idle Postgres client error:', error);
            });
            ownedPool = pool;

            container.register<PostgresConnectionPool>(PostgresPoolToken, {useValue: pool});
            bindLedgerPorts(PostgresLedgerPersistenceAdapter);
            break;
        }
        case 'supabase': {
            console.log('📦 Using Supabase adapter');

            const supabaseClient = createClient(env.SUPABASE_URL ?? '', env.SUPABASE_PUBLISHABLE_KEY ?? '', {
                auth: {
                    persistSession: false, // サーバー側ではセッション永続化不要
                },
                global: {
                    headers: {
                        'x-application-name': 'points-bank',
                    },
                },
            });

            container.register<LedgerSupabaseClient>(SupabaseClientToken, {useValue: supabaseClient});
            bindLedgerPorts(SupabaseLedgerPersistenceAdapter);
            break;
        }
        case 'memory': {
            console.log('💾 Using InMemory adapter');
            bindLedgerPorts(InMemoryLedgerPersistenceAdapter);
            break;
        }
    }

    // ========================================
    // 3. Clock の登録
    // ========================================
    container.register(ClockToken, {useValue: new SystemClock(env.TIME_ZONE)});

    // ========================================
    // 4. アプリケーションサービスの登録
    // ========================================
    container.register(RecordPointsUseCaseToken, {useClass: PointsLedgerApplicationService});
    container.register(GetPointsSummaryQueryToken, {useClass: PointsSummaryQueryService});

    isInitialized = true;
    console.log(`✅ DI container initialized (store: ${env.LEDGER_STORE})`);
}

/**
 * プロセスが所有する接続を閉じる
 */
export async function disposeContainer(): Promise<void> {
    if (ownedPool) {
        const pool = ownedPool;
        ownedPool = null;
        await pool.end();
        console.log('🔌 Postgres pool closed');
    }
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * 値の登録とシングルトンのインスタンスを破棄し、次の setupContainer で登録し直す。
 */
export function resetContainer(): void {
    container.clearInstances();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
