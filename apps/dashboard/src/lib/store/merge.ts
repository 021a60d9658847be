import type { SongRecord, VideoObservation } from "@votes-vs-views/shared";

export function latestObservations(observations: readonly VideoObservation[]): Map<string, VideoObservation> {
    const latest = new Map<string, VideoObservation>();

    for (const observation of observations) {
        const current = latest.get(observation.identifier);
        if (!current || observation.observedAt >= current.observedAt) {
            latest.set(observation.identifier, observation);
        }
    }
    return latest;
}

export function attachObservations(songs: readonly SongRecord[], observations: readonly VideoObservation[]): SongRecord[] {
    const latest = latestObservations(observations);

    return songs.map(song => {
        const observation = song.identifier ? latest.get(song.identifier) : undefined;
        return observation ? { ...song, observation } : { ...song };
    });
}
