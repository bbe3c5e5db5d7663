import { RunOrchestrator, OrchestratorDeps } from '../src/workers/run.orchestrator';
import { RunStateMachine, IllegalTransitionError } from '../src/workers/run.state';
import { CaptchaExhaustedError, NavigationError } from '../src/shared/errors/portal.errors';
import { Credentials, DownloadResult, ReportRequest } from '../src/shared/types/portal.types';
import { BrowserSession } from '../src/scraping/browser/browser-session';
import { FakeSession } from './support/fake-session';

const credentials: Credentials = Object.freeze({
    businessId: '12345678',
    userId: 'tester',
    password: 'test-secret',
    localUsername: 'alice',
});

function request(month: number, isSupplementaryPriorMonth: boolean): ReportRequest {
    const mm = String(month).padStart(2, '0');
    return {
        periodStart: `2026-${mm}-01`,
        periodEnd: `2026-${mm}-28`,
        year: 2026,
        month,
        label: `2026年${month}月`,
        isSupplementaryPriorMonth,
    };
}

const current = request(3, false);
const prior = request(2, true);

function downloaded(req: ReportRequest, file: string): DownloadResult {
    return { status: 'downloaded', request: req, files: [file], pages: 1 };
}

function setup(
    fetchImpl: (req: ReportRequest) => Promise<DownloadResult>,
    plan: () => ReportRequest[] = () => [current, prior],
) {
    const session = new FakeSession();
    const login = jest.fn(async (_session: BrowserSession, _credentials: Credentials) => undefined);
    const openReportScreen = jest.fn(async (_session: BrowserSession) => undefined);
    const fetch = jest.fn(async (_session: BrowserSession, req: ReportRequest, _options?: { reload?: boolean }) =>
        fetchImpl(req),
    );
    const openSession = jest.fn(async () => session);
    const deps: OrchestratorDeps = {
        openSession,
        navigator: { login, openReportScreen },
        fetcher: { fetch },
        plan,
    };
    return { session, login, openReportScreen, fetch, openSession, orchestrator: new RunOrchestrator(deps) };
}

const runOptions = { credentials, downloadDir: '/tmp/downloads' };

describe('RunOrchestrator', () => {
    it('downloads both periods and exits 0', async () => {
        const { session, fetch, openSession, orchestrator } = setup(async (req) =>
            downloaded(req, `/tmp/downloads/${req.month}.xlsx`),
        );

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('DONE');
        expect(report.exitCode).toBe(0);
        expect(report.partial).toBe(false);
        expect(report.history).toEqual([
            'INIT',
            'LOGGING_IN',
            'NAVIGATING',
            'FETCHING_CURRENT',
            'FETCHING_PRIOR',
            'CLOSING',
            'DONE',
        ]);
        expect(report.periods.map((p) => p.files)).toEqual([['/tmp/downloads/3.xlsx'], ['/tmp/downloads/2.xlsx']]);
        expect(report.steps.map((s) => `${s.step}:${s.status}`)).toEqual([
            'open browser:succeeded',
            'login:succeeded',
            'open report screen:succeeded',
            'fetch 2026年3月:succeeded',
            'fetch 2026年2月:succeeded',
            'close session:succeeded',
        ]);
        expect(openSession).toHaveBeenCalledWith({ downloadDir: '/tmp/downloads' });
        expect(fetch.mock.calls.map((call) => call[2])).toEqual([{ reload: false }, { reload: true }]);
        expect(session.closeCount).toBe(1);
    });

    it('skips the prior state when only one period is planned', async () => {
        const { orchestrator } = setup(
            async (req) => downloaded(req, '/tmp/downloads/3.xlsx'),
            () => [current],
        );

        const report = await orchestrator.run(runOptions);

        expect(report.history).toEqual(['INIT', 'LOGGING_IN', 'NAVIGATING', 'FETCHING_CURRENT', 'CLOSING', 'DONE']);
    });

    it('reports partial success with exit code 2 when one period times out', async () => {
        const { session, orchestrator } = setup(async (req) =>
            req.month === 3
                ? downloaded(req, '/tmp/downloads/3.xlsx')
                : {
                      status: 'timeout',
                      request: req,
                      files: ['/tmp/downloads/2-page1.xlsx'],
                      error: 'No download completed within 60000ms',
                  },
        );

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('DONE');
        expect(report.partial).toBe(true);
        expect(report.exitCode).toBe(2);
        expect(report.periods[1]).toEqual({
            request: prior,
            status: 'failed',
            files: ['/tmp/downloads/2-page1.xlsx'],
            error: 'No download completed within 60000ms',
            errorCode: 'DOWNLOAD_TIMEOUT',
        });
        expect(session.closeCount).toBe(1);
    });

    it('still fetches the prior month after the current one throws', async () => {
        const { fetch, orchestrator } = setup(async (req) => {
            if (req.month === 3) throw new NavigationError('Result grid not found');
            return downloaded(req, '/tmp/downloads/2.xlsx');
        });

        const report = await orchestrator.run(runOptions);

        expect(fetch).toHaveBeenCalledTimes(2);
        expect(report.exitCode).toBe(2);
        expect(report.periods[0]).toMatchObject({ status: 'failed', errorCode: 'NAVIGATION_FAILED' });
    });

    it('aborts with exit code 1 when no period downloads', async () => {
        const { session, orchestrator } = setup(async (req) => ({
            status: 'timeout',
            request: req,
            files: [],
            error: 'No download completed within 60000ms',
        }));

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('ABORTED');
        expect(report.exitCode).toBe(1);
        expect(report.history.slice(-2)).toEqual(['FETCHING_PRIOR', 'ABORTED']);
        expect(session.closeCount).toBe(1);
    });

    it('aborts on a login failure without fetching', async () => {
        const { session, login, fetch, openReportScreen, orchestrator } = setup(async (req) =>
            downloaded(req, '/tmp/downloads/x.xlsx'),
        );
        login.mockRejectedValueOnce(new CaptchaExhaustedError(3));

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('ABORTED');
        expect(report.exitCode).toBe(1);
        expect(report.history).toEqual(['INIT', 'LOGGING_IN', 'ABORTED']);
        expect(report.steps[1]).toMatchObject({
            step: 'login',
            status: 'failed',
            errorCode: 'CAPTCHA_EXHAUSTED',
            detail: 'CAPTCHA not solved after 3 attempts',
        });
        expect(report.steps.at(-1)).toMatchObject({ step: 'close session', status: 'succeeded' });
        expect(openReportScreen).not.toHaveBeenCalled();
        expect(fetch).not.toHaveBeenCalled();
        expect(session.closeCount).toBe(1);
    });

    it('aborts on a navigation failure and closes the session', async () => {
        const { session, openReportScreen, fetch, orchestrator } = setup(async (req) =>
            downloaded(req, '/tmp/downloads/x.xlsx'),
        );
        openReportScreen.mockRejectedValueOnce(new NavigationError('Menu entry missing'));

        const report = await orchestrator.run(runOptions);

        expect(report.history).toEqual(['INIT', 'LOGGING_IN', 'NAVIGATING', 'ABORTED']);
        expect(fetch).not.toHaveBeenCalled();
        expect(session.closeCount).toBe(1);
    });

    it('does not close a session that never opened', async () => {
        const { session, openSession, login, orchestrator } = setup(async (req) =>
            downloaded(req, '/tmp/downloads/x.xlsx'),
        );
        openSession.mockRejectedValueOnce(new Error('Chrome not found'));

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('ABORTED');
        expect(report.steps).toEqual([
            expect.objectContaining({ step: 'open browser', status: 'failed', errorCode: 'UNKNOWN', detail: 'Chrome not found' }),
        ]);
        expect(login).not.toHaveBeenCalled();
        expect(session.closeCount).toBe(0);
    });

    it('logs a failed close without changing the outcome', async () => {
        const { session, orchestrator } = setup(async (req) => downloaded(req, '/tmp/downloads/x.xlsx'));
        session.closeError = new Error('browser already gone');

        const report = await orchestrator.run(runOptions);

        expect(report.state).toBe('DONE');
        expect(report.exitCode).toBe(0);
        expect(report.steps[report.steps.length - 1]).toMatchObject({
            step: 'close session',
            status: 'failed',
            detail: 'browser already gone',
        });
        expect(session.closeCount).toBe(1);
    });

    it('lets a signal handler close the session of a running download', async () => {
        let orchestrator: RunOrchestrator | null = null;
        const fixture = setup(async (req) => {
            if (orchestrator) await orchestrator.closeActiveSession();
            return downloaded(req, '/tmp/downloads/x.xlsx');
        });
        orchestrator = fixture.orchestrator;

        const report = await orchestrator.run(runOptions);

        expect(fixture.session.closeCount).toBe(1);
        expect(report.steps[report.steps.length - 1]).toEqual({
            step: 'close session',
            status: 'skipped',
            detail: 'closed by shutdown',
            durationMs: 0,
        });
    });
});

describe('RunStateMachine', () => {
    it('records the states entered', () => {
        const machine = new RunStateMachine();
        machine.transition('LOGGING_IN');
        machine.transition('ABORTED');

        expect(machine.history).toEqual(['INIT', 'LOGGING_IN', 'ABORTED']);
        expect(machine.isTerminal).toBe(true);
    });

    it('rejects skipping a state', () => {
        const machine = new RunStateMachine();

        expect(() => machine.transition('FETCHING_CURRENT')).toThrow(IllegalTransitionError);
        expect(machine.state).toBe('INIT');
    });

    it('rejects leaving a terminal state', () => {
        const machine = new RunStateMachine();
        machine.transition('ABORTED');

        expect(() => machine.transition('LOGGING_IN')).toThrow('Illegal run state transition ABORTED -> LOGGING_IN');
    });
});
