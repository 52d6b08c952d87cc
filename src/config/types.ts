import type {SupabaseClient} from '@supabase/supabase-js';

/**
 * 台帳ストアの種類
 * - memory: プロセス内（開発・テスト用）
 * - postgres: Postgres に直接接続（起動時にテーブルを作成）
 * - supabase: Supabase の REST API 経由（テーブルはマイグレーションで作成）
 */
export type LedgerStoreKind = 'memory' | 'postgres' | 'supabase';

/**
 * Supabaseクライアント
 *
 * 生成済みの型定義は使わず、行の形はマッパー側のスキーマで検証する
 */
export type LedgerSupabaseClient = SupabaseClient;

/**
 * DI用のトークン
 */
export const AppEnvToken = Symbol('AppEnv');
export const SupabaseClientToken = Symbol('SupabaseClient');
export const PostgresPoolToken = Symbol('PostgresPool');
