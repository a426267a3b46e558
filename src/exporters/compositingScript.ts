/**
 * Compositing-script codec: an After Effects ExtendScript (.jsx) that builds a
 * composition with a one-node camera animated by the shot's keyframes.
 *
 * Positions are east-north-up offsets from the first keyframe (WGS84 local
 * tangent frame), mapped to AE axes [east, -up, north] and scaled by
 * unitsPerMeter. Rotations: X = tilt - 90, Y = heading (unwrapped), Z = roll.
 */
import { ExportFormatError } from '../lib/errors';
import { LocalTangentFrame, angleDelta, type Enu } from '../lib/geo';
import type { ShotPlan } from '../models/shot';

export interface CompositingScriptOptions {
    width: number;
    height: number;
    frameRate: number;
    unitsPerMeter: number;
    compName?: string;
}

export interface CompositingTrack {
    frames: number[];
    times: number[];
    positions: [number, number, number][];
    rotationX: number[];
    rotationY: number[];
    rotationZ: number[];
}

const round4 = (n: number) => Math.round(n * 1e4) / 1e4 + 0;

/** ExtendScript string literal (ES3: U+2028/U+2029 end a line). */
export function scriptString(text: string): string {
    return JSON.stringify(text).replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');
}

function assertFiniteAll(values: number[], what: string): void {
    for (const v of values) {
        if (!Number.isFinite(v)) throw new ExportFormatError(`Cannot write non-finite ${what} (${v}) to a compositing script`);
    }
}

export const toAfterEffectsAxes = (v: Enu, unitsPerMeter: number): [number, number, number] => [
    round4(v.east * unitsPerMeter),
    round4(-v.up * unitsPerMeter),
    round4(v.north * unitsPerMeter),
];

/** Keyframe → frame-indexed camera track; rejects two keyframes on one frame. */
export function buildCompositingTrack(plan: ShotPlan, options: CompositingScriptOptions): CompositingTrack {
    const { frameRate, unitsPerMeter } = options;
    if (!(frameRate > 0) || !(unitsPerMeter > 0)) {
        throw new ExportFormatError(`frameRate and unitsPerMeter must be positive (got ${frameRate}, ${unitsPerMeter})`);
    }
    if (plan.keyframes.length === 0) {
        throw new ExportFormatError(`Shot ${plan.id} has no keyframes`);
    }

    for (const kf of plan.keyframes) {
        assertFiniteAll([kf.t, kf.lat, kf.lng, kf.altM, kf.headingDeg, kf.tiltDeg, kf.rollDeg], `value in ${plan.id}`);
    }

    const first = plan.keyframes[0];
    const frame = new LocalTangentFrame({ lat: first.lat, lng: first.lng, altM: first.altM });
    const track: CompositingTrack = { frames: [], times: [], positions: [], rotationX: [], rotationY: [], rotationZ: [] };

    let heading = first.headingDeg;
    plan.keyframes.forEach((kf, i) => {
        const frameIndex = Math.round(kf.t * frameRate);
        const prevFrame = track.frames[track.frames.length - 1];
        if (prevFrame !== undefined && frameIndex <= prevFrame) {
            throw new ExportFormatError(
                `Keyframes ${i - 1} and ${i} of ${plan.id} land on frame ${frameIndex} at ${frameRate} fps`,
            );
        }
        if (i > 0) heading += angleDelta(plan.keyframes[i - 1].headingDeg, kf.headingDeg);

        track.frames.push(frameIndex);
        track.times.push(frameIndex / frameRate);
        track.positions.push(toAfterEffectsAxes(frame.toLocal(kf), unitsPerMeter));
        track.rotationX.push(round4(kf.tiltDeg - 90));
        track.rotationY.push(round4(heading));
        track.rotationZ.push(round4(kf.rollDeg));
    });

    return track;
}

const list = (values: number[]) => `[${values.join(', ')}]`;

export function exportCompositingScript(plan: ShotPlan, options: CompositingScriptOptions): string {
    const { width, height, frameRate } = options;
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
        throw new ExportFormatError(`Composition size must be positive integers (got ${width}x${height})`);
    }

    const track = buildCompositingTrack(plan, options);
    const lastFrame = track.frames[track.frames.length - 1];
    const durationSec = round4(Math.max(plan.params.durationSec, (lastFrame + 1) / frameRate));
    const compName = options.compName ?? `${plan.id} ${plan.title}`;

    return [
        `// ${plan.title.replace(/[\r\n\u2028\u2029]/g, ' ')} (${plan.preset}): ${track.frames.length} camera keyframes at ${frameRate} fps`,
        '(function () {',
        `    var compName = ${scriptString(compName)};`,
        '    app.beginUndoGroup(compName);',
        `    var comp = app.project.items.addComp(compName, ${width}, ${height}, 1, ${durationSec}, ${frameRate});`,
        `    var camera = comp.layers.addCamera(${scriptString(plan.id)}, [${width / 2}, ${height / 2}]);`,
        '    camera.autoOrient = AutoOrientType.NO_AUTO_ORIENT;',
        '',
        `    var times = ${list(track.times.map(round4))};`,
        `    var positions = [${track.positions.map(list).join(', ')}];`,
        `    var rotationX = ${list(track.rotationX)};`,
        `    var rotationY = ${list(track.rotationY)};`,
        `    var rotationZ = ${list(track.rotationZ)};`,
        '',
        '    camera.property("Position").setValuesAtTimes(times, positions);',
        '    camera.property("X Rotation").setValuesAtTimes(times, rotationX);',
        '    camera.property("Y Rotation").setValuesAtTimes(times, rotationY);',
        '    camera.property("Z Rotation").setValuesAtTimes(times, rotationZ);',
        '',
        '    comp.openInViewer();',
        '    app.endUndoGroup();',
        '})();',
        '',
    ].join('\n');
}
