/**
 * Contract of the networked half of the state store. Expiry is native to
 * the backend; every method may reject on I/O failure.
 */
export interface NetworkBackend {
    readonly name: string;
    ping(): Promise<void>;
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds?: number): Promise<void>;
    delete(key: string): Promise<boolean>;
    exists(key: string): Promise<boolean>;
    /** Removes every key in the backend's namespace. */
    clear(): Promise<number>;
    indexAdd(index: string, member: string, score: number): Promise<void>;
    indexRemove(index: string, member: string): Promise<boolean>;
    /** Highest score first. */
    indexMembers(index: string): Promise<string[]>;
    indexCount(index: string): Promise<number>;
    close(): Promise<void>;
}
