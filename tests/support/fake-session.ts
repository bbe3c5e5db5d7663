import { BrowserSession } from '../../src/scraping/browser/browser-session';
import { SpeechEngine, SpeechOutput } from '../../src/scraping/captcha/whisper.client';

type Handler = (session: FakeSession) => void | Promise<void>;

/**
 * In-memory BrowserSession. Elements are plain selector strings; tests
 * script the page by adding selectors and click handlers.
 */
export class FakeSession implements BrowserSession {
    url = 'about:blank';
    present = new Set<string>();
    checked = new Set<string>();
    disabled = new Set<string>();
    texts = new Map<string, string[]>();
    attributes = new Map<string, string>();
    typed = new Map<string, string>();
    selected = new Map<string, string>();
    dialogs: string[] = [];
    clicks: string[] = [];
    gotos: string[] = [];
    fetched: string[] = [];
    keys: string[] = [];
    reloads = 0;
    closeCount = 0;
    closeError: Error | null = null;

    private clickHandlers = new Map<string, Handler>();
    private gotoHandler: ((session: FakeSession, url: string) => void) | null = null;
    private reloadHandler: Handler | null = null;

    onClick(selector: string, handler: Handler): this {
        this.clickHandlers.set(selector, handler);
        return this;
    }

    onGoto(handler: (session: FakeSession, url: string) => void): this {
        this.gotoHandler = handler;
        return this;
    }

    onReload(handler: Handler): this {
        this.reloadHandler = handler;
        return this;
    }

    show(...selectors: string[]): this {
        for (const selector of selectors) this.present.add(selector);
        return this;
    }

    setAttribute(selector: string, name: string, value: string): void {
        this.attributes.set(`${selector}@${name}`, value);
    }

    async goto(url: string): Promise<void> {
        this.gotos.push(url);
        this.url = url;
        if (this.gotoHandler) this.gotoHandler(this, url);
    }

    async reload(): Promise<void> {
        this.reloads++;
        if (this.reloadHandler) await this.reloadHandler(this);
    }

    currentUrl(): string {
        return this.url;
    }

    async exists(selector: string): Promise<boolean> {
        return selector
            .split(',')
            .map((part) => part.trim())
            .some((part) => this.present.has(part));
    }

    async waitFor(selector: string): Promise<boolean> {
        return this.exists(selector);
    }

    async waitForNavigation(): Promise<boolean> {
        return true;
    }

    async click(selector: string): Promise<void> {
        if (!this.present.has(selector)) {
            throw new Error(`No element matches ${selector}`);
        }
        this.clicks.push(selector);
        const handler = this.clickHandlers.get(selector);
        if (handler) await handler(this);
    }

    async clickByText(selector: string, text: string): Promise<boolean> {
        const key = `${selector}:${text}`;
        if (!this.present.has(key)) return false;
        this.clicks.push(key);
        return true;
    }

    async type(selector: string, text: string): Promise<void> {
        if (!this.present.has(selector)) {
            throw new Error(`No element matches ${selector}`);
        }
        this.typed.set(selector, text);
    }

    async select(selector: string, value: string): Promise<void> {
        this.selected.set(selector, value);
    }

    async pressKey(key: 'Escape' | 'Enter'): Promise<void> {
        this.keys.push(key);
    }

    async isChecked(selector: string): Promise<boolean> {
        return this.checked.has(selector);
    }

    async isDisabled(selector: string): Promise<boolean> {
        return this.disabled.has(selector);
    }

    async textOf(selector: string): Promise<string | null> {
        const texts = this.texts.get(selector);
        return texts && texts.length > 0 ? texts[0] : null;
    }

    async textsOf(selector: string): Promise<string[]> {
        return this.texts.get(selector) ?? [];
    }

    async attributeOf(selector: string, name: string): Promise<string | null> {
        return this.attributes.get(`${selector}@${name}`) ?? null;
    }

    takeDialogMessages(): string[] {
        const messages = this.dialogs;
        this.dialogs = [];
        return messages;
    }

    async fetchBytes(url: string): Promise<Buffer> {
        this.fetched.push(url);
        return Buffer.from(`audio:${url}`);
    }

    async close(): Promise<void> {
        this.closeCount++;
        if (this.closeError) throw this.closeError;
    }
}

/** Speech engine answering from a list, repeating the last entry */
export class ScriptedEngine implements SpeechEngine {
    readonly name = 'stub';
    calls = 0;
    signals: Array<AbortSignal | undefined> = [];

    constructor(private answers: Array<string | Error>) {}

    async transcribe(_audio: Buffer, signal?: AbortSignal): Promise<SpeechOutput> {
        const answer = this.answers[Math.min(this.calls, this.answers.length - 1)];
        this.calls++;
        this.signals.push(signal);
        if (answer instanceof Error) throw answer;
        return { text: answer };
    }
}
