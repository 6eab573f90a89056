/**
 * fingerprintNoise.ts — Make a page's hardware signals agree with the
 * session's fingerprint descriptor.
 *
 * The stealth plugin patches the obvious headless tells; this module makes
 * the WebGL vendor/renderer and `navigator.platform` report the hardware
 * profile the session was created with, so the page and the fast-path
 * headers describe the same machine for the session's whole lifetime.
 */

import type { Page } from 'puppeteer';
import type { FingerprintDescriptor } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('FingerprintNoise');

/** Apply the descriptor to a Page before its first navigation. */
export async function applyFingerprint(
  page: Page,
  fingerprint: FingerprintDescriptor,
): Promise<void> {
  logger.debug(
    `Applying fingerprint ${fingerprint.hardware.platform} / ` +
      `${fingerprint.hardware.webglRenderer.slice(0, 40)}…`,
  );

  await page.setViewport(fingerprint.viewport);
  await page.setUserAgent(fingerprint.userAgent);
  await page.setExtraHTTPHeaders({ 'accept-language': fingerprint.acceptLanguage });

  await injectPlatform(page, fingerprint.hardware.platform);
  await injectWebGLIdentity(
    page,
    fingerprint.hardware.webglRenderer,
    fingerprint.hardware.webglVendor,
  );
}

// ─── navigator.platform ────────────────────────────────────

async function injectPlatform(page: Page, platform: string): Promise<void> {
  await page.evaluateOnNewDocument((value: string) => {
    Object.defineProperty(Navigator.prototype, 'platform', {
      get: () => value,
      configurable: true,
    });
  }, platform);
}

// ─── WebGL vendor / renderer ───────────────────────────────

async function injectWebGLIdentity(page: Page, renderer: string, vendor: string): Promise<void> {
  await page.evaluateOnNewDocument(
    (rendererValue: string, vendorValue: string) => {
      const prototypes = [
        WebGLRenderingContext.prototype,
        ...(typeof WebGL2RenderingContext !== 'undefined'
          ? [WebGL2RenderingContext.prototype]
          : []),
      ];

      for (const proto of prototypes) {
        const original = proto.getParameter;
        const nativeString = original.toString();

        Object.defineProperty(proto, 'getParameter', {
          value: function (this: WebGLRenderingContext, pname: number) {
            // UNMASKED_VENDOR_WEBGL / UNMASKED_RENDERER_WEBGL
            if (pname === 0x9245) return vendorValue;
            if (pname === 0x9246) return rendererValue;
            return original.call(this, pname);
          },
          writable: true,
          configurable: true,
        });

        proto.getParameter.toString = () => nativeString;
      }
    },
    renderer,
    vendor,
  );
}
