import type { WindowFunction } from '@rfmapper/shared';

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/** Radix-2 DIT FFT (in-place, split real/imaginary Float64) */
export function fft(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  // Bit-reversal permutation
  for (let i = 1, j = 0; i < N; i++) {
    let bit = N >> 1;
    while (j & bit) { j ^= bit; bit >>= 1; }
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }
  // Butterfly
  for (let len = 2; len <= N; len <<= 1) {
    const half = len >> 1;
    const angle = -2 * Math.PI / len;
    const wRe = Math.cos(angle), wIm = Math.sin(angle);
    for (let i = 0; i < N; i += len) {
      let curRe = 1, curIm = 0;
      for (let j = 0; j < half; j++) {
        const a = i + j, b = a + half;
        const tRe = curRe * re[b] - curIm * im[b];
        const tIm = curRe * im[b] + curIm * re[b];
        re[b] = re[a] - tRe; im[b] = im[a] - tIm;
        re[a] += tRe; im[a] += tIm;
        const tmp = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = tmp;
      }
    }
  }
}

/**
 * Direct DFT of the first `bins` outputs, for block sizes the radix-2 path
 * cannot take. Results are written back into `re`/`im`.
 */
export function dft(re: Float64Array, im: Float64Array, bins: number): void {
  const N = re.length;
  const outRe = new Float64Array(bins);
  const outIm = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    let sumRe = 0, sumIm = 0;
    for (let n = 0; n < N; n++) {
      const angle = (-2 * Math.PI * k * n) / N;
      const c = Math.cos(angle), s = Math.sin(angle);
      sumRe += re[n] * c - im[n] * s;
      sumIm += re[n] * s + im[n] * c;
    }
    outRe[k] = sumRe;
    outIm[k] = sumIm;
  }
  re.set(outRe);
  im.set(outIm);
}

/** Window coefficients of length N */
export function makeWindow(fn: WindowFunction, N: number): Float64Array {
  const w = new Float64Array(N);
  if (fn === 'rectangular' || N === 1) return w.fill(1);

  for (let n = 0; n < N; n++) {
    const x = (2 * Math.PI * n) / (N - 1);
    switch (fn) {
      case 'hann':
        w[n] = 0.5 - 0.5 * Math.cos(x);
        break;
      case 'hamming':
        w[n] = 0.54 - 0.46 * Math.cos(x);
        break;
      case 'blackman-harris': {
        const a0 = 0.35875, a1 = 0.48829, a2 = 0.14128, a3 = 0.01168;
        w[n] = a0 - a1 * Math.cos(x) + a2 * Math.cos(2 * x) - a3 * Math.cos(3 * x);
        break;
      }
    }
  }
  return w;
}
