/**
 * hardwareProfiles.ts — Self-consistent desktop profiles used to build a
 * session's fingerprint descriptor.
 *
 * A profile pairs a GPU renderer with the platform and user-agent it
 * actually ships on (no "Apple M2" on Windows). One descriptor is picked per
 * session and reused for the session's whole lifetime: the browser page, the
 * fast-path headers and the fallback all present the same identity.
 */

import type { FingerprintDescriptor } from './types';

export interface HardwareProfile {
  /** WebGL UNMASKED_RENDERER string. */
  webglRenderer: string;
  /** WebGL UNMASKED_VENDOR string. */
  webglVendor: string;
  /** navigator.platform value. */
  platform: 'Win32' | 'MacIntel';
  /** Screen resolution [width, height]. */
  screen: [number, number];
}

const WINDOWS_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const MAC_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const HARDWARE_PROFILES: readonly HardwareProfile[] = [
  {
    webglRenderer: 'ANGLE (Intel(R) UHD Graphics 630 Direct3D11 vs_5_0 ps_5_0)',
    webglVendor: 'Google Inc. (Intel)',
    platform: 'Win32',
    screen: [1920, 1080],
  },
  {
    webglRenderer: 'ANGLE (Intel(R) Iris(R) Xe Graphics Direct3D11 vs_5_0 ps_5_0)',
    webglVendor: 'Google Inc. (Intel)',
    platform: 'Win32',
    screen: [1536, 864],
  },
  {
    webglRenderer: 'ANGLE (NVIDIA GeForce RTX 3060 Direct3D11 vs_5_0 ps_5_0)',
    webglVendor: 'Google Inc. (NVIDIA)',
    platform: 'Win32',
    screen: [2560, 1440],
  },
  {
    webglRenderer: 'ANGLE (AMD Radeon RX 580 Direct3D11 vs_5_0 ps_5_0)',
    webglVendor: 'Google Inc. (AMD)',
    platform: 'Win32',
    screen: [1920, 1080],
  },
  {
    webglRenderer: 'ANGLE (Apple, Apple M1, OpenGL 4.1)',
    webglVendor: 'Google Inc. (Apple)',
    platform: 'MacIntel',
    screen: [1440, 900],
  },
  {
    webglRenderer: 'ANGLE (Apple, Apple M2, OpenGL 4.1)',
    webglVendor: 'Google Inc. (Apple)',
    platform: 'MacIntel',
    screen: [1512, 982],
  },
];

/** US-market locales; the upstream is searched with `en_US` regardless. */
const LOCALES: ReadonlyArray<{ locale: string; acceptLanguage: string }> = [
  { locale: 'en-US', acceptLanguage: 'en-US,en;q=0.9' },
  { locale: 'en-US', acceptLanguage: 'en-US,en;q=0.9,es;q=0.8' },
  { locale: 'en-US', acceptLanguage: 'en-US,en;q=0.9,fr;q=0.8' },
  { locale: 'en-CA', acceptLanguage: 'en-CA,en;q=0.9,en-US;q=0.8' },
];

/** Largest viewport we ever report; bigger screens get a windowed browser. */
const MAX_VIEWPORT: [number, number] = [1920, 1080];

/**
 * Build a fingerprint descriptor from a random profile and locale.
 * `random` is injectable so tests can pin the pick.
 */
export function pickFingerprint(random: () => number = Math.random): FingerprintDescriptor {
  const hardware = HARDWARE_PROFILES[Math.floor(random() * HARDWARE_PROFILES.length)];
  const { locale, acceptLanguage } = LOCALES[Math.floor(random() * LOCALES.length)];

  return {
    userAgent: hardware.platform === 'MacIntel' ? MAC_UA : WINDOWS_UA,
    locale,
    acceptLanguage,
    viewport: {
      width: Math.min(hardware.screen[0], MAX_VIEWPORT[0]),
      height: Math.min(hardware.screen[1], MAX_VIEWPORT[1]),
    },
    hardware,
  };
}
