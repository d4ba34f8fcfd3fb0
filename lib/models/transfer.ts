/**
 * Progress information for installer downloads
 */
export type TransferProgress = {
    loaded: number;
    total: number;
}
