import { createHash } from 'node:crypto';

/** 不可變的 navigation snapshot SHA-256 指紋，用於確認建置的冪等性 */
export class IndexFingerprint {
  private constructor(public readonly value: string) {}

  /** 從可序列化的 snapshot 計算 SHA-256 */
  static fromSnapshot(snapshot: unknown): IndexFingerprint {
    const hash = createHash('sha256').update(JSON.stringify(snapshot), 'utf-8').digest('hex');
    return new IndexFingerprint(hash);
  }

  /** 從既有的 hex 字串建立（例如讀回上次寫出的 manifest） */
  static fromHex(hex: string): IndexFingerprint {
    if (!/^[0-9a-f]{64}$/.test(hex)) {
      throw new Error(`Invalid fingerprint: ${hex}`);
    }
    return new IndexFingerprint(hex);
  }

  equals(other: IndexFingerprint): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
