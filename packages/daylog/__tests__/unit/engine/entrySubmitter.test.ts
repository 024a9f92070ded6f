import { afterEach, describe, expect, test, vi } from 'vitest';
import { EntrySubmitter } from '../../../src/engine/EntrySubmitter';
import { LocatorResolver } from '../../../src/engine/LocatorResolver';
import { IMMEDIATE_TIMINGS } from '../../../src/config/timing';
import { DEFAULT_PROFILE } from '../../../src/site/defaultProfile';
import { Logger, type LogLevel } from '../../../src/monitoring/logger';
import type { EntrySpec } from '../../../src/engine/types';
import { FakeBrowserSession, FakeElement, FakeScope } from '../../fixtures/fakeBrowser';

const ENTRY: EntrySpec = { date: '2024-03-05', content: '整理實驗紀錄', category: 'A01' };

// ── Helpers ──────────────────────────────────────────────────────────────

interface Form {
  date: FakeElement;
  work: FakeElement;
  category: FakeElement;
  send: FakeElement;
}

/** Put the journal form into `scope`; clicking send shows `response` in `responseScope`. */
function addForm(scope: FakeScope, response: string, responseScope: FakeScope = scope): Form {
  return {
    date: scope.add('id=date'),
    work: scope.add('id=work'),
    category: scope.add('id=schno', new FakeElement({ options: ['A01', 'B02'] })),
    send: scope.add(
      'id=btnSent',
      new FakeElement({
        onClick: () => {
          responseScope.text = response;
        },
      }),
    ),
  };
}

/** A logger whose lines are parsed into `lines` instead of printed. */
function captureLogger(level: LogLevel): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = new Logger({
    level,
    sink: (_level, line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

function submitter(session: FakeBrowserSession, logger?: Logger): EntrySubmitter {
  return new EntrySubmitter({
    session,
    profile: DEFAULT_PROFILE.entry,
    resolver: new LocatorResolver({ timeout: 0, pollInterval: 0 }),
    timings: IMMEDIATE_TIMINGS,
    logger,
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ── Tests ────────────────────────────────────────────────────────────────

describe('EntrySubmitter', () => {
  describe('top-level form', () => {
    test('fills the era date, content and category, then reports success', async () => {
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '資料新增完成');

      const outcome = await submitter(session).submit(ENTRY);

      expect(outcome).toEqual({ kind: 'success' });
      expect(form.date.value).toBe('1130305');
      expect(form.work.value).toBe('整理實驗紀錄');
      expect(form.category.selected).toBe('A01');
      expect(form.send.clicks).toBe(1);
    });

    test('a negative marker is an explicit failure naming it', async () => {
      const session = new FakeBrowserSession();
      addForm(session.top, '日期重複，請重新輸入');

      expect(await submitter(session).submit(ENTRY)).toEqual({
        kind: 'explicit_failure',
        reason: 'Site reported "重複"',
      });
    });

    test('no marker either way is ambiguous', async () => {
      const session = new FakeBrowserSession();
      addForm(session.top, '學習日誌');

      expect(await submitter(session).submit(ENTRY)).toEqual({ kind: 'ambiguous' });
    });

    test('a missing content field fails the day without submitting', async () => {
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '成功');
      session.top.remove('id=work');

      const outcome = await submitter(session).submit(ENTRY);

      expect(outcome).toEqual({
        kind: 'explicit_failure',
        reason: 'No element found for content field after 3 candidate(s)',
      });
      expect(form.send.clicks).toBe(0);
    });

    test('an unencodable date fails before the form is touched', async () => {
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '成功');

      const outcome = await submitter(session).submit({ ...ENTRY, date: '1900-01-01' });

      expect(outcome).toEqual({
        kind: 'explicit_failure',
        reason: 'Invalid date "1900-01-01": year must be after 1911',
      });
      expect(form.date.value).toBe('');
      expect(session.top.queries).toEqual([]);
    });

    test('fallback selectors are used when ids are missing', async () => {
      const session = new FakeBrowserSession();
      const date = session.top.add("css=input[placeholder*='民國yyymmdd']");
      const work = session.top.add('name=work');
      session.top.add(
        "css=input[value*='新增']",
        new FakeElement({
          onClick: () => {
            session.top.text = '儲存成功';
          },
        }),
      );

      const outcome = await submitter(session).submit(ENTRY);

      expect(outcome).toEqual({ kind: 'success' });
      expect(date.value).toBe('1130305');
      expect(work.value).toBe('整理實驗紀錄');
    });
  });

  describe('category', () => {
    test('an unknown category is a warning, the entry is still sent', async () => {
      const { logger, lines } = captureLogger('warn');
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '成功');

      const outcome = await submitter(session, logger).submit({ ...ENTRY, category: 'Z99' });

      expect(outcome).toEqual({ kind: 'success' });
      expect(form.category.selected).toBeNull();
      expect(form.send.clicks).toBe(1);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 'warn',
        msg: 'Category not among the available options',
        component: 'submitter',
        date: '2024-03-05',
        category: 'Z99',
        options: ['A01', 'B02'],
      });
    });

    test('a missing selector is skipped', async () => {
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '成功');
      session.top.remove('id=schno');

      expect(await submitter(session).submit(ENTRY)).toEqual({ kind: 'success' });
      expect(form.send.clicks).toBe(1);
    });
  });

  describe('missing controls', () => {
    test('a missing date field logs the controls the page does have', async () => {
      const { logger, lines } = captureLogger('error');
      const session = new FakeBrowserSession();
      session.top.controls = [
        { tag: 'input', id: 'qdate', name: 'qdate', type: 'text', value: null, placeholder: '查詢日期', onclick: null },
        { tag: 'button', id: null, name: null, type: 'button', value: null, placeholder: null, onclick: 'query()' },
      ];

      const outcome = await submitter(session, logger).submit(ENTRY);

      expect(outcome).toEqual({
        kind: 'explicit_failure',
        reason: 'No element found for date field after 3 candidate(s)',
      });
      expect(lines[0]).toMatchObject({
        level: 'error',
        msg: 'Required control missing',
        component: 'submitter',
        date: '2024-03-05',
        role: 'date field',
        controls: session.top.controls,
      });
      expect(lines[1]).toMatchObject({ msg: 'Entry submission failed' });
    });

    test('a missing submit control still fails the day when controls cannot be listed', async () => {
      const { logger, lines } = captureLogger('error');
      const session = new FakeBrowserSession();
      const form = addForm(session.top, '成功');
      session.top.remove('id=btnSent');
      vi.spyOn(session.top, 'describeControls').mockRejectedValue(new Error('Target closed'));

      const outcome = await submitter(session, logger).submit(ENTRY);

      expect(outcome).toEqual({
        kind: 'explicit_failure',
        reason: 'No element found for submit control after 4 candidate(s)',
      });
      expect(form.work.value).toBe('整理實驗紀錄');
      expect(lines[0]).toMatchObject({ msg: 'Required control missing', role: 'submit control', controls: [] });
    });
  });

  describe('nested form', () => {
    test('fills the form inside its frame and reads the verdict there', async () => {
      const session = new FakeBrowserSession();
      const menu = new FakeScope();
      const content = new FakeScope();
      session.frames = [menu, content];
      const form = addForm(content, '新增完成');

      const outcome = await submitter(session).submit(ENTRY);

      expect(outcome).toEqual({ kind: 'success' });
      expect(form.date.value).toBe('1130305');
      expect(session.entered).toEqual([0, 1, 1]);
      expect(session.released).toEqual([0, 1, 1]);
      expect(session.activeFrame()).toBeNull();
    });

    test('the frame is released when filling fails inside it', async () => {
      const session = new FakeBrowserSession();
      const content = new FakeScope();
      session.frames = [content];
      addForm(content, '成功');
      content.add('id=work', new FakeElement({ typeError: new Error('Element is outside of the viewport') }));

      const outcome = await submitter(session).submit(ENTRY);

      expect(outcome).toEqual({ kind: 'explicit_failure', reason: 'Element is outside of the viewport' });
      expect(session.activeFrame()).toBeNull();
    });

    test('a verdict shown at the top level counts too', async () => {
      const session = new FakeBrowserSession();
      const content = new FakeScope();
      session.frames = [content];
      addForm(content, '日期錯誤', session.top);

      expect(await submitter(session).submit(ENTRY)).toEqual({
        kind: 'explicit_failure',
        reason: 'Site reported "錯誤"',
      });
    });
  });
});
