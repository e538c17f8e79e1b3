/**
 * ドメイン層: 受信メッセージの型定義
 *
 * 注意: メッセージ値は「データの通過点」なので、ビジネスロジックは持たない。
 * 型の識別子・フィールド形状・メッセージ値・リスナーのみを定義する。
 */

/**
 * メッセージ種別の識別子（正規化された型名。例: 'tickPrice'）。
 */
export type MessageTypeIdentity = string;

/**
 * フィールド形状: 位置引数を名前付きフィールドへ対応付ける順序付きのフィールド名列。
 */
export type FieldShape = readonly string[];

/**
 * フィールド名 → 値 のマッピング。
 */
export type FieldMapping = Readonly<Record<string, unknown>>;

/**
 * 受信イベント 1 件を表す不変のメッセージ値。
 * dispatch のたびに新しく生成され、Receiver は配信後に保持しない。
 */
export interface MessageValue {
  /** メッセージ種別の識別子 */
  readonly typeName: MessageTypeIdentity;
  /** フィールド値（FieldShape の順序で並ぶ） */
  readonly fields: FieldMapping;
  /** `<typeName field=value, ...>` 形式の文字列表現 */
  toString(): string;
}

/**
 * メッセージ種別。型名・フィールド形状と、メッセージ値のコンストラクタを持つ。
 */
export interface MessageType {
  readonly typeName: MessageTypeIdentity;
  readonly fieldShape: FieldShape;
  /**
   * 名前付きフィールドからメッセージ値を生成する。
   * @param fields フィールド値（不足分は null で補う）
   * @throws {MessageConstructionError} FieldShape にないフィールドが含まれる場合
   */
  create(fields: FieldMapping): MessageValue;
}

/**
 * 型の参照: 型名の文字列、またはメッセージ種別そのもの。
 * どちらで参照しても同じキーに正規化される。
 */
export type MessageTypeRef = MessageTypeIdentity | MessageType;

/**
 * リスナー（購読者）。戻り値は参照しない。
 * Promise を返した場合、reject は同期 throw と同じく障害として扱う。
 */
export type Listener = (message: MessageValue) => void | Promise<void>;

/**
 * 位置引数を受け取って dispatch へ転送する、型ごとの入口関数。
 */
export type EntryPoint = (...args: unknown[]) => void;
