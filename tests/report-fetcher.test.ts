import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PORTAL, monthCellSelector } from '../src/config/constants';
import { DownloadWatcher } from '../src/scraping/downloaders/download-watcher';
import { ReportFetcher } from '../src/scraping/downloaders/report-fetcher';
import { NavigationError } from '../src/shared/errors/portal.errors';
import { ReportRequest } from '../src/shared/types/portal.types';
import { FakeSession } from './support/fake-session';

const S = PORTAL.SELECTORS;

const march: ReportRequest = {
    periodStart: '2026-03-01',
    periodEnd: '2026-03-31',
    year: 2026,
    month: 3,
    label: '2026年3月',
    isSupplementaryPriorMonth: false,
};

describe('ReportFetcher', () => {
    let dir: string;
    let fetcher: ReportFetcher;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-fetcher-'));
        fetcher = new ReportFetcher(new DownloadWatcher(dir, { timeoutMs: 50, pollIntervalMs: 5 }), {
            retryDelayMs: 1,
            settleMs: 0,
            resultsSettleMs: 0,
            waitTimeoutMs: 0,
        });
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    /**
     * Report screen whose download button saves export-1.xlsx, export-2.xlsx, ...
     * A reload puts the grid back on page 1.
     */
    function reportScreen(pages = 1, afterReload: () => void = () => undefined): FakeSession {
        const session = new FakeSession().show(
            S.MONTH_INPUT,
            S.PICKER_OVERLAY,
            S.PICKER_YEAR,
            S.PICKER_PREV_YEAR,
            S.PICKER_NEXT_YEAR,
            monthCellSelector(2),
            monthCellSelector(3),
            S.INVOICE_TYPE_RADIO,
            S.BUSINESS_TYPE_RADIO,
            S.SEARCH_BUTTON,
            S.PAGE_SIZE_SELECT,
            S.SELECT_ALL,
            S.DOWNLOAD_BUTTON,
            S.NEXT_PAGE_BUTTON,
        );
        session.texts.set(S.PICKER_YEAR, ['2026年']);

        let downloads = 0;
        session.onClick(S.DOWNLOAD_BUTTON, () => {
            downloads++;
            fs.writeFileSync(path.join(dir, `export-${downloads}.xlsx`), 'xlsx');
        });

        let page = 1;
        if (pages === 1) session.disabled.add(S.NEXT_PAGE_BUTTON);
        session.onClick(S.NEXT_PAGE_BUTTON, (s) => {
            page++;
            if (page === pages) s.disabled.add(S.NEXT_PAGE_BUTTON);
        });
        session.onReload((s) => {
            page = 1;
            if (pages > 1) s.disabled.delete(S.NEXT_PAGE_BUTTON);
            afterReload();
        });
        return session;
    }

    it('fills the form and downloads a single page', async () => {
        const session = reportScreen();

        const result = await fetcher.fetch(session, march);

        expect(result).toEqual({
            status: 'downloaded',
            request: march,
            files: [path.join(dir, 'export-1.xlsx')],
            pages: 1,
        });
        expect(session.clicks).toEqual([
            S.MONTH_INPUT,
            monthCellSelector(3),
            S.INVOICE_TYPE_RADIO,
            S.BUSINESS_TYPE_RADIO,
            S.SEARCH_BUTTON,
            S.SELECT_ALL,
            S.DOWNLOAD_BUTTON,
        ]);
        expect(session.selected.get(S.PAGE_SIZE_SELECT)).toBe('1000');
        expect(session.reloads).toBe(0);
    });

    it('downloads every result page', async () => {
        const session = reportScreen(3);

        const result = await fetcher.fetch(session, march);

        expect(result).toMatchObject({
            status: 'downloaded',
            files: ['export-1.xlsx', 'export-2.xlsx', 'export-3.xlsx'].map((f) => path.join(dir, f)),
            pages: 3,
        });
        expect(session.clicks.filter((c) => c === S.NEXT_PAGE_BUTTON)).toHaveLength(2);
    });

    it('moves the picker back to an earlier year', async () => {
        const session = reportScreen();
        const december: ReportRequest = {
            periodStart: '2025-12-01',
            periodEnd: '2025-12-31',
            year: 2025,
            month: 12,
            label: '2025年12月',
            isSupplementaryPriorMonth: true,
        };
        session.show(monthCellSelector(12));

        await fetcher.fetch(session, december);

        expect(session.clicks.slice(0, 4)).toEqual([
            S.MONTH_INPUT,
            S.PICKER_YEAR,
            S.PICKER_PREV_YEAR,
            monthCellSelector(12),
        ]);
    });

    it('does not untick an already selected grid', async () => {
        const session = reportScreen();
        session.checked.add(S.SELECT_ALL);

        await fetcher.fetch(session, march);

        expect(session.clicks).not.toContain(S.SELECT_ALL);
    });

    it('keeps going without the page size selector', async () => {
        const session = reportScreen();
        session.present.delete(S.PAGE_SIZE_SELECT);

        const result = await fetcher.fetch(session, march);

        expect(result.status).toBe('downloaded');
        expect(session.selected.size).toBe(0);
    });

    it('reloads first when asked to', async () => {
        const session = reportScreen();

        await fetcher.fetch(session, march, { reload: true });

        expect(session.reloads).toBe(1);
    });

    it('reloads and retries once after a download timeout', async () => {
        const session = reportScreen();
        let clicks = 0;
        session.onClick(S.DOWNLOAD_BUTTON, () => {
            clicks++;
            if (clicks === 2) fs.writeFileSync(path.join(dir, 'late.xlsx'), 'xlsx');
        });

        const result = await fetcher.fetch(session, march);

        expect(result).toMatchObject({ status: 'downloaded', files: [path.join(dir, 'late.xlsx')] });
        expect(session.reloads).toBe(1);
    });

    it('reports a timeout after the retry also times out', async () => {
        const session = reportScreen();
        session.onClick(S.DOWNLOAD_BUTTON, () => undefined);

        const result = await fetcher.fetch(session, march);

        expect(result).toEqual({
            status: 'timeout',
            request: march,
            files: [],
            error: 'No download completed within 50ms',
        });
        expect(session.reloads).toBe(1);
        expect(session.clicks.filter((c) => c === S.DOWNLOAD_BUTTON)).toHaveLength(2);
    });

    it('resumes at the page that timed out without exporting earlier pages again', async () => {
        const session = reportScreen(2);
        let clicks = 0;
        session.onClick(S.DOWNLOAD_BUTTON, () => {
            clicks++;
            if (clicks !== 2) fs.writeFileSync(path.join(dir, `export-${clicks}.xlsx`), 'xlsx');
        });

        const result = await fetcher.fetch(session, march);

        expect(result).toEqual({
            status: 'downloaded',
            request: march,
            files: [path.join(dir, 'export-1.xlsx'), path.join(dir, 'export-3.xlsx')],
            pages: 2,
        });
        expect(fs.readdirSync(dir).sort()).toEqual(['export-1.xlsx', 'export-3.xlsx']);
        expect(session.reloads).toBe(1);
        expect(session.clicks.filter((c) => c === S.DOWNLOAD_BUTTON)).toHaveLength(3);
        expect(session.clicks.filter((c) => c === S.NEXT_PAGE_BUTTON)).toHaveLength(2);
    });

    it('takes a late download as the page that timed out', async () => {
        const session = reportScreen(2, () => fs.writeFileSync(path.join(dir, 'late-2.xlsx'), 'xlsx'));
        let clicks = 0;
        session.onClick(S.DOWNLOAD_BUTTON, () => {
            clicks++;
            if (clicks === 1) fs.writeFileSync(path.join(dir, 'export-1.xlsx'), 'xlsx');
        });

        const result = await fetcher.fetch(session, march);

        expect(result).toMatchObject({
            status: 'downloaded',
            files: [path.join(dir, 'export-1.xlsx'), path.join(dir, 'late-2.xlsx')],
            pages: 2,
        });
        expect(clicks).toBe(2);
    });

    it('ignores files that were in the directory before the export', async () => {
        fs.writeFileSync(path.join(dir, 'older.xlsx'), 'xlsx');
        const session = reportScreen();

        const result = await fetcher.fetch(session, march);

        expect(result).toMatchObject({ files: [path.join(dir, 'export-1.xlsx')] });
        expect(session.clicks).toContain(S.DOWNLOAD_BUTTON);
    });

    it('reports the pages saved before a second timeout', async () => {
        const session = reportScreen(2);
        let clicks = 0;
        session.onClick(S.DOWNLOAD_BUTTON, () => {
            clicks++;
            if (clicks === 1) fs.writeFileSync(path.join(dir, 'export-1.xlsx'), 'xlsx');
        });

        const result = await fetcher.fetch(session, march);

        expect(result).toEqual({
            status: 'timeout',
            request: march,
            files: [path.join(dir, 'export-1.xlsx')],
            error: 'No download completed within 50ms',
        });
        expect(clicks).toBe(3);
    });

    it('fails without retrying when the form is missing an element', async () => {
        const session = reportScreen();
        session.present.delete(S.SEARCH_BUTTON);

        await expect(fetcher.fetch(session, march)).rejects.toThrow(NavigationError);
        expect(session.reloads).toBe(0);
    });

    it('fails when the picker year cannot be read', async () => {
        const session = reportScreen();
        session.texts.delete(S.PICKER_YEAR);

        await expect(fetcher.fetch(session, march)).rejects.toThrow(
            'Could not read the year shown by the month picker',
        );
    });
});
