import { InvalidInputError } from "../errors";
import { AudioTimeline, Span } from "../types";

export interface SilenceOptions {
	/** Level (dBFS) under which a window counts as silent. */
	silenceThresholdDb: number;
	minSilenceMs: number;
	seekStepMs: number;
}

export interface TrimOptions extends SilenceOptions {
	marginMs: number;
	targetSampleRate: number;
	targetLoudnessDb: number;
}

export const DEFAULT_TRIM_OPTIONS: TrimOptions = {
	silenceThresholdDb: -40,
	minSilenceMs: 2000,
	seekStepMs: 10,
	marginMs: 100,
	targetSampleRate: 16000,
	targetLoudnessDb: -20,
};

export interface TrimResult {
	/** Mono, at the target sample rate. */
	timeline: AudioTimeline;
	/** Kept spans, in milliseconds of the mono input. */
	segments: Span[];
	originalDurationMs: number;
	trimmedDurationMs: number;
	gainDb: number;
}

export interface VoiceActivityReport {
	totalDurationMs: number;
	voiceDurationMs: number;
	silenceDurationMs: number;
	/** Percentage of the timeline that is voice, 0-100. */
	voiceRatio: number;
	segmentCount: number;
	/** The first ten detected segments. */
	segments: Span[];
}

//-------------------------------------------------------
// [Validation]
//-------------------------------------------------------
function validateTimeline(timeline: AudioTimeline): void {
	if (!Number.isFinite(timeline.sampleRate) || timeline.sampleRate <= 0) {
		throw new InvalidInputError(`Invalid sample rate: ${timeline.sampleRate}`);
	}
	if (timeline.channels.length === 0) {
		throw new InvalidInputError("Audio timeline has no channels");
	}
	const length = timeline.channels[0].length;
	if (length === 0) {
		throw new InvalidInputError("Audio timeline is empty");
	}
	if (timeline.channels.some((channel) => channel.length !== length)) {
		throw new InvalidInputError("Audio channels differ in length");
	}
}

function validateOptions(options: TrimOptions): void {
	if (options.minSilenceMs <= 0 || options.seekStepMs <= 0) {
		throw new InvalidInputError("minSilenceMs and seekStepMs must be positive");
	}
	if (options.marginMs < 0) {
		throw new InvalidInputError("marginMs must not be negative");
	}
	if (!Number.isFinite(options.targetSampleRate) || options.targetSampleRate <= 0) {
		throw new InvalidInputError(`Invalid target sample rate: ${options.targetSampleRate}`);
	}
}

//-------------------------------------------------------
// [Sample utilities]
//-------------------------------------------------------
export function downmix(timeline: AudioTimeline): Float32Array {
	validateTimeline(timeline);
	const [first, ...rest] = timeline.channels;
	if (rest.length === 0) {
		return first;
	}

	const mono = new Float32Array(first.length);
	const channelCount = timeline.channels.length;
	for (let i = 0; i < mono.length; i++) {
		let sum = 0;
		for (const channel of timeline.channels) {
			sum += channel[i];
		}
		mono[i] = sum / channelCount;
	}
	return mono;
}

/**
 * Linear-interpolation resampling.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
	if (fromRate === toRate || samples.length === 0) {
		return samples;
	}

	const length = Math.max(1, Math.round((samples.length * toRate) / fromRate));
	const output = new Float32Array(length);
	const step = fromRate / toRate;
	const last = samples.length - 1;

	for (let i = 0; i < length; i++) {
		const position = i * step;
		const index = Math.min(Math.floor(position), last);
		const next = Math.min(index + 1, last);
		const fraction = position - index;
		output[i] = samples[index] * (1 - fraction) + samples[next] * fraction;
	}
	return output;
}

export function durationMs(sampleCount: number, sampleRate: number): number {
	return Math.round((sampleCount * 1000) / sampleRate);
}

function msToFrame(ms: number, sampleRate: number, sampleCount: number): number {
	return Math.min(sampleCount, Math.max(0, Math.round((ms * sampleRate) / 1000)));
}

export function amplitudeToDb(rms: number): number {
	return rms > 0 ? 20 * Math.log10(rms) : -Infinity;
}

export function measureLevelDb(samples: Float32Array): number {
	if (samples.length === 0) {
		return -Infinity;
	}
	let sumSquares = 0;
	for (const sample of samples) {
		sumSquares += sample * sample;
	}
	return amplitudeToDb(Math.sqrt(sumSquares / samples.length));
}

/**
 * Running sum of squares; the energy of `[a, b)` is `sums[b] - sums[a]`.
 */
function squaredPrefixSums(samples: Float32Array): Float64Array {
	const sums = new Float64Array(samples.length + 1);
	for (let i = 0; i < samples.length; i++) {
		sums[i + 1] = sums[i] + samples[i] * samples[i];
	}
	return sums;
}

//-------------------------------------------------------
// [Segment detection]
//-------------------------------------------------------
/**
 * Maximal silent ranges, in milliseconds. Windows of `minSilenceMs` are tested
 * every `seekStepMs`; overlapping silent windows merge into one range.
 */
export function detectSilence(samples: Float32Array, sampleRate: number, options: SilenceOptions): Span[] {
	const lengthMs = durationMs(samples.length, sampleRate);
	const { minSilenceMs, seekStepMs, silenceThresholdDb } = options;
	if (lengthMs < minSilenceMs) {
		return [];
	}

	const sums = squaredPrefixSums(samples);
	const isSilent = (startMs: number): boolean => {
		const from = msToFrame(startMs, sampleRate, samples.length);
		const to = msToFrame(startMs + minSilenceMs, sampleRate, samples.length);
		if (to <= from) {
			return true;
		}
		const rms = Math.sqrt(Math.max(0, sums[to] - sums[from]) / (to - from));
		return amplitudeToDb(rms) < silenceThresholdDb;
	};

	const lastStart = lengthMs - minSilenceMs;
	const starts: number[] = [];
	for (let start = 0; start <= lastStart; start += seekStepMs) {
		starts.push(start);
	}
	if (lastStart % seekStepMs !== 0) {
		starts.push(lastStart);
	}

	const silentStarts = starts.filter(isSilent);
	if (silentStarts.length === 0) {
		return [];
	}

	const ranges: Span[] = [];
	let rangeStart = silentStarts[0];
	let previous = silentStarts[0];
	for (const start of silentStarts.slice(1)) {
		const continuous = start === previous + seekStepMs;
		const hasGap = start > previous + minSilenceMs;
		if (!continuous && hasGap) {
			ranges.push({ startMs: rangeStart, endMs: previous + minSilenceMs });
			rangeStart = start;
		}
		previous = start;
	}
	ranges.push({ startMs: rangeStart, endMs: previous + minSilenceMs });
	return ranges;
}

/**
 * The complement of `detectSilence`. Empty when the whole timeline is silent,
 * including timelines too short to hold one silence window.
 */
export function detectNonSilent(samples: Float32Array, sampleRate: number, options: SilenceOptions): Span[] {
	const lengthMs = durationMs(samples.length, sampleRate);
	const silent = detectSilence(samples, sampleRate, options);

	if (silent.length === 0) {
		if (lengthMs < options.minSilenceMs && measureLevelDb(samples) < options.silenceThresholdDb) {
			return [];
		}
		return [{ startMs: 0, endMs: lengthMs }];
	}
	if (silent[0].startMs === 0 && silent[0].endMs >= lengthMs) {
		return [];
	}

	const spans: Span[] = [];
	let previousEnd = 0;
	for (const range of silent) {
		spans.push({ startMs: previousEnd, endMs: range.startMs });
		previousEnd = range.endMs;
	}
	if (previousEnd < lengthMs) {
		spans.push({ startMs: previousEnd, endMs: lengthMs });
	}
	return spans.filter((span) => span.endMs > span.startMs);
}

export function expandSegments(spans: readonly Span[], marginMs: number, lengthMs: number): Span[] {
	return spans.map((span) => ({
		startMs: Math.max(0, span.startMs - marginMs),
		endMs: Math.min(lengthMs, span.endMs + marginMs),
	}));
}

/**
 * Sorts and merges spans that touch or overlap.
 */
export function mergeSegments(spans: readonly Span[]): Span[] {
	const sorted = [...spans].sort((a, b) => a.startMs - b.startMs || a.endMs - b.endMs);
	const merged: Span[] = [];
	for (const span of sorted) {
		const current = merged[merged.length - 1];
		if (current && span.startMs <= current.endMs) {
			current.endMs = Math.max(current.endMs, span.endMs);
		} else {
			merged.push({ ...span });
		}
	}
	return merged;
}

export function concatenate(samples: Float32Array, sampleRate: number, spans: readonly Span[]): Float32Array {
	const ranges = spans.map((span) => [
		msToFrame(span.startMs, sampleRate, samples.length),
		msToFrame(span.endMs, sampleRate, samples.length),
	]);
	const total = ranges.reduce((sum, [from, to]) => sum + Math.max(0, to - from), 0);

	const output = new Float32Array(total);
	let offset = 0;
	for (const [from, to] of ranges) {
		if (to > from) {
			output.set(samples.subarray(from, to), offset);
			offset += to - from;
		}
	}
	return output;
}

/**
 * Applies one gain so the RMS level reaches `targetDb`, clipping to [-1, 1].
 * Silence is returned unchanged.
 */
export function normalize(samples: Float32Array, targetDb: number): { samples: Float32Array; gainDb: number } {
	const level = measureLevelDb(samples);
	if (!Number.isFinite(level)) {
		return { samples: Float32Array.from(samples), gainDb: 0 };
	}

	const gainDb = targetDb - level;
	const factor = Math.pow(10, gainDb / 20);
	const output = new Float32Array(samples.length);
	for (let i = 0; i < samples.length; i++) {
		output[i] = Math.max(-1, Math.min(1, samples[i] * factor));
	}
	return { samples: output, gainDb };
}

//-------------------------------------------------------
// [Pipeline]
//-------------------------------------------------------
function prepareMono(timeline: AudioTimeline, targetSampleRate: number): Float32Array {
	return resample(downmix(timeline), timeline.sampleRate, targetSampleRate);
}

/**
 * Downmix, resample, cut silence (keeping `marginMs` around speech) and
 * normalize. Returns null when nothing but silence is found.
 */
export function trimSilence(timeline: AudioTimeline, options: Partial<TrimOptions> = {}): TrimResult | null {
	const opts: TrimOptions = { ...DEFAULT_TRIM_OPTIONS, ...options };
	validateOptions(opts);

	const rate = opts.targetSampleRate;
	const mono = prepareMono(timeline, rate);
	const lengthMs = durationMs(mono.length, rate);

	const voiced = detectNonSilent(mono, rate, opts);
	if (voiced.length === 0) {
		return null;
	}

	const segments = mergeSegments(expandSegments(voiced, opts.marginMs, lengthMs));
	const { samples, gainDb } = normalize(concatenate(mono, rate, segments), opts.targetLoudnessDb);

	return {
		timeline: { sampleRate: rate, channels: [samples] },
		segments,
		originalDurationMs: lengthMs,
		trimmedDurationMs: durationMs(samples.length, rate),
		gainDb,
	};
}

export function analyzeVoiceActivity(timeline: AudioTimeline, options: Partial<TrimOptions> = {}): VoiceActivityReport {
	const opts: TrimOptions = { ...DEFAULT_TRIM_OPTIONS, ...options };
	validateOptions(opts);

	const rate = opts.targetSampleRate;
	const mono = prepareMono(timeline, rate);
	const totalDurationMs = durationMs(mono.length, rate);
	const segments = detectNonSilent(mono, rate, opts);
	const voiceDurationMs = segments.reduce((sum, span) => sum + (span.endMs - span.startMs), 0);

	return {
		totalDurationMs,
		voiceDurationMs,
		silenceDurationMs: totalDurationMs - voiceDurationMs,
		voiceRatio: totalDurationMs > 0 ? (voiceDurationMs / totalDurationMs) * 100 : 0,
		segmentCount: segments.length,
		segments: segments.slice(0, 10),
	};
}
