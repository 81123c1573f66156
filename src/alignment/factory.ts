import { type AlignmentNorm } from '../types/config.js';
import { getSettings } from '../classes/settings.js';
import { type AlignerStrategy } from './aligner.js';
import { AngularAligner } from './angular.js';
import { EuclideanAligner } from './euclidean.js';
import { SequentialAligner } from './sequential.js';

/**
 * Picks the aligner for a closure combination:
 * open/open is sequential, closed/closed angular, anything mixed euclidean.
 * Without an explicit norm the configured one applies.
 */
export function getAligner(closed1: boolean, closed2: boolean, norm?: AlignmentNorm): AlignerStrategy {
    const morphing = getSettings().config.morphing;
    if (!closed1 && !closed2) {
        return new SequentialAligner();
    }
    if (closed1 && closed2) {
        return new AngularAligner(norm ?? morphing.angularAlignmentNorm ?? morphing.vertexAlignmentNorm);
    }
    return new EuclideanAligner(norm ?? morphing.euclideanAlignmentNorm ?? morphing.vertexAlignmentNorm);
}
