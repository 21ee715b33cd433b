/**
 * BrowserPlayerHost - Hosts the embedded player in headless Chromium.
 * Player events are bridged back to Node through an exposed page function.
 */

import puppeteer, { Browser, Page } from 'puppeteer-core';
import { logger } from '../utils/logger';
import { PlayerHandle, PlayerHost, PlayerOptions } from './PlayerProbe';

const BRIDGE_FUNCTION = '__playerEvent';
const IFRAME_API_URL = 'https://www.youtube.com/iframe_api';

export interface BrowserPlayerHostOptions {
    executablePath: string;
    headless?: boolean;
}

/**
 * Page markup that builds a player once the iframe API has loaded
 */
export function playerPageHtml(options: Pick<PlayerOptions, 'videoId' | 'width' | 'height' | 'playerVars'>): string {
    const config = JSON.stringify({
        videoId: options.videoId,
        width: options.width,
        height: options.height,
        playerVars: options.playerVars,
    });

    return `<!DOCTYPE html>
<html>
<body>
<div id="player"></div>
<script>
  window.onYouTubeIframeAPIReady = function () {
    var config = ${config};
    config.events = {
      onReady: function () { window.${BRIDGE_FUNCTION}('ready', null); },
      onStateChange: function (event) { window.${BRIDGE_FUNCTION}('state', event.data); },
      onError: function (event) { window.${BRIDGE_FUNCTION}('error', event.data); }
    };
    window.__player = new YT.Player('player', config);
  };
</script>
<script src="${IFRAME_API_URL}"></script>
</body>
</html>`;
}

export class BrowserPlayerHost implements PlayerHost {
    private readonly options: BrowserPlayerHostOptions;
    private browser: Browser | null = null;

    constructor(options: BrowserPlayerHostOptions) {
        this.options = options;
    }

    async createPlayer(options: PlayerOptions): Promise<PlayerHandle> {
        const browser = await this.getBrowser();
        const page = await browser.newPage();

        try {
            await page.exposeFunction(BRIDGE_FUNCTION, (type: string, value: unknown) => {
                switch (type) {
                    case 'ready':
                        options.events.onReady();
                        break;
                    case 'state':
                        if (typeof value === 'number') options.events.onStateChange(value);
                        break;
                    case 'error':
                        options.events.onError(typeof value === 'number' || typeof value === 'string' ? value : 'unknown');
                        break;
                }
            });
            await page.setContent(playerPageHtml(options), { waitUntil: 'domcontentloaded' });
        } catch (error) {
            await page.close();
            throw error;
        }

        return this.handleFor(page);
    }

    async close(): Promise<void> {
        const browser = this.browser;
        this.browser = null;
        if (browser) {
            await browser.close();
            logger.info('Headless browser closed');
        }
    }

    private handleFor(page: Page): PlayerHandle {
        const call = async (method: string): Promise<void> => {
            await page.evaluate(`window.__player && window.__player.${method} && window.__player.${method}()`);
        };

        return {
            mute: () => call('mute'),
            stopVideo: () => call('stopVideo'),
            getAvailableQualityLevels: async () => {
                const levels: unknown = await page.evaluate(
                    'window.__player && window.__player.getAvailableQualityLevels ? window.__player.getAvailableQualityLevels() : []',
                );
                return Array.isArray(levels) ? levels.filter((level): level is string => typeof level === 'string') : [];
            },
            destroy: async () => {
                if (page.isClosed()) return;
                await call('destroy');
                await page.close();
            },
        };
    }

    private async getBrowser(): Promise<Browser> {
        if (!this.browser || !this.browser.connected) {
            this.browser = await puppeteer.launch({
                executablePath: this.options.executablePath,
                headless: this.options.headless ?? true,
                args: ['--autoplay-policy=no-user-gesture-required', '--mute-audio', '--no-sandbox'],
            });
            logger.info('Headless browser launched for player probing');
        }
        return this.browser;
    }
}
