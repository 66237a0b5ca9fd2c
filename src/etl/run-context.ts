/**
 * State shared by every record of one ingestion run.
 *
 * Tracks which paper claimed each DOI so that a second paper carrying the
 * same DOI in the same run stores it as null instead of failing on the
 * unique index. Reset at the start of each LOAD stage.
 */
export class RunContext {
    private readonly seenDois = new Map<string, string>();
    private droppedDois = 0;

    /**
     * Claim `doi` for `paperId`.
     * Returns the DOI to store: unchanged when free or already owned by the
     * same paper, null when another paper claimed it earlier in the run.
     */
    claimDoi(doi: string | null, paperId: string): string | null {
        if (doi === null) return null;

        const owner = this.seenDois.get(doi);
        if (owner === undefined) {
            this.seenDois.set(doi, paperId);
            return doi;
        }
        if (owner === paperId) return doi;

        this.droppedDois++;
        return null;
    }

    get duplicateDoisDropped(): number {
        return this.droppedDois;
    }

    reset(): void {
        this.seenDois.clear();
        this.droppedDois = 0;
    }
}
