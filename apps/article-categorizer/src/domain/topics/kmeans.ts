/**
 * @fileoverview Deterministic k-means
 *
 * Lloyd iterations from farthest-first seeds. No randomness: the first
 * seed is row 0 and each next seed is the row farthest from every chosen
 * seed (lowest index on ties).
 *
 * @module domain/topics/kmeans
 */

const kMaxIterations = 100;

function squaredDistance(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const delta = (a[i] ?? 0) - (b[i] ?? 0);
        sum += delta * delta;
    }
    return sum;
}

function seedCentroids(rows: readonly (readonly number[])[], k: number): number[][] {
    const chosen: number[] = [0];

    while (chosen.length < k) {
        let bestIndex = -1;
        let bestDistance = -1;

        rows.forEach((row, index) => {
            if (chosen.includes(index)) {
                return;
            }
            const nearest = Math.min(...chosen.map((seed) => squaredDistance(row, rows[seed] ?? [])));
            if (nearest > bestDistance) {
                bestDistance = nearest;
                bestIndex = index;
            }
        });

        if (bestIndex < 0) {
            break;
        }
        chosen.push(bestIndex);
    }

    return chosen.map((index) => [...(rows[index] ?? [])]);
}

function nearestCentroid(row: readonly number[], centroids: readonly (readonly number[])[]): number {
    let best = 0;
    let bestDistance = Number.POSITIVE_INFINITY;
    centroids.forEach((centroid, index) => {
        const distance = squaredDistance(row, centroid);
        if (distance < bestDistance) {
            bestDistance = distance;
            best = index;
        }
    });
    return best;
}

/**
 * Cluster `rows` into at most `k` groups.
 *
 * @returns Cluster index per row
 */
export function kMeans(rows: readonly (readonly number[])[], k: number): number[] {
    if (rows.length === 0) {
        return [];
    }

    const clusterCount = Math.max(1, Math.min(k, rows.length));
    const centroids = seedCentroids(rows, clusterCount);
    let assignments = rows.map((row) => nearestCentroid(row, centroids));

    for (let iteration = 0; iteration < kMaxIterations; iteration++) {
        centroids.forEach((centroid, cluster) => {
            const members = rows.filter((_, index) => assignments[index] === cluster);
            if (members.length === 0) {
                return;
            }
            for (let column = 0; column < centroid.length; column++) {
                centroid[column] = members.reduce((sum, row) => sum + (row[column] ?? 0), 0) / members.length;
            }
        });

        const next = rows.map((row) => nearestCentroid(row, centroids));
        const changed = next.some((cluster, index) => cluster !== assignments[index]);
        assignments = next;
        if (!changed) {
            break;
        }
    }

    return assignments;
}
