import { describe, expect, test, vi } from 'vitest';
import { PageNavigator, entryFormUrls } from '../../../src/engine/PageNavigator';
import { LocatorResolver } from '../../../src/engine/LocatorResolver';
import { IMMEDIATE_TIMINGS } from '../../../src/config/timing';
import { DEFAULT_PROFILE } from '../../../src/site/defaultProfile';
import { FakeBrowserSession, FakeElement, FakeScope } from '../../fixtures/fakeBrowser';

const PROFILE = DEFAULT_PROFILE.navigation;
const MENU_URL = 'https://journal.test/punch/Menu.jsp';
const JOURNAL_LINK = "xpath=//a[contains(text(), '日誌')]";

function navigator(session: FakeBrowserSession): PageNavigator {
  return new PageNavigator({
    session,
    profile: PROFILE,
    startUrl: MENU_URL,
    resolver: new LocatorResolver({ timeout: 0, pollInterval: 0 }),
    timings: IMMEDIATE_TIMINGS,
  });
}

function menuSession(): FakeBrowserSession {
  const session = new FakeBrowserSession();
  session.url = MENU_URL;
  session.top.source = '<a href="Logout.jsp">登出</a>';
  return session;
}

// ── entryFormUrls ────────────────────────────────────────────────────────

describe('entryFormUrls', () => {
  test('takes the root from the current URL', () => {
    expect(entryFormUrls('https://journal.test/punch/Menu.jsp', 'https://other.test/', PROFILE)).toEqual([
      'https://journal.test/punch/PunchList_A.jsp',
      'https://journal.test/PunchList_A.jsp',
      'https://journal.test/punch/journal.jsp',
      'https://journal.test/journal.jsp',
    ]);
  });

  test('falls back to the start URL when the current one lacks the root segment', () => {
    expect(entryFormUrls('about:blank', 'https://journal.test/punch/Menu.jsp', PROFILE)[0]).toBe(
      'https://journal.test/punch/PunchList_A.jsp',
    );
  });

  test('strips trailing slashes when neither URL has the root segment', () => {
    expect(entryFormUrls('about:blank', 'https://journal.test/app//', PROFILE)[1]).toBe(
      'https://journal.test/app/PunchList_A.jsp',
    );
  });
});

// ── reachEntryForm ───────────────────────────────────────────────────────

describe('PageNavigator', () => {
  test('link strategy clicks the first matching feature link', async () => {
    const session = menuSession();
    const link = session.top.add(
      JOURNAL_LINK,
      new FakeElement({
        onClick: () => {
          session.url = 'https://journal.test/punch/PunchList_A.jsp';
        },
      }),
    );

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'link' });
    expect(link.clicks).toBe(1);
    expect(session.top.queries).toEqual(["xpath=//a[contains(text(), '學習日誌')]", JOURNAL_LINK]);
  });

  test('a link that does not lead to the form moves on to the next candidate', async () => {
    const session = menuSession();
    const wrong = session.top.add("xpath=//a[contains(text(), '學習日誌')]");
    session.top.add(
      "xpath=//a[contains(@href, 'PunchList_A')]",
      new FakeElement({
        onClick: () => {
          session.top.source = '<input id="work">';
        },
      }),
    );

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'link' });
    expect(wrong.clicks).toBe(1);
  });

  test('frame strategy finds the link in a nested document', async () => {
    const session = menuSession();
    const menuFrame = new FakeScope();
    const contentFrame = new FakeScope();
    session.frames = [contentFrame, menuFrame];
    menuFrame.add(
      JOURNAL_LINK,
      new FakeElement({
        onClick: () => {
          menuFrame.source = '<input id="date" placeholder="民國yyymmdd">';
        },
      }),
    );

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'frame' });
    expect(session.entered).toEqual([0, 1]);
    expect(session.activeFrame()).toBeNull();
    expect(session.visited).toEqual([]);
  });

  test('direct_url strategy visits form paths until one shows the form', async () => {
    const session = menuSession();
    session.unreachable.add('https://journal.test/punch/PunchList_A.jsp');
    session.unreachable.add('https://journal.test/PunchList_A.jsp');
    session.onGoto = (url) => {
      session.top.source = url.endsWith('/punch/journal.jsp') ? '<td>工作內容</td>' : '';
    };

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'direct_url' });
    expect(session.visited).toEqual([
      'https://journal.test/punch/PunchList_A.jsp',
      'https://journal.test/PunchList_A.jsp',
      'https://journal.test/punch/journal.jsp',
    ]);
  });

  test('a strategy that throws falls through to the next one', async () => {
    const session = menuSession();
    vi.spyOn(session, 'frameCount').mockRejectedValue(new Error('Target closed'));

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'direct_url' });
    expect(session.visited).toEqual(['https://journal.test/punch/PunchList_A.jsp']);
  });

  test('manual window succeeds when someone reaches the form meanwhile', async () => {
    const session = menuSession();
    for (const url of entryFormUrls(MENU_URL, MENU_URL, PROFILE)) session.unreachable.add(url);
    vi.spyOn(session, 'linkTexts').mockImplementation(async () => {
      session.top.source = '<h2>學習日誌</h2>';
      return ['首頁', '登出'];
    });

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'manual' });
    expect(session.linkTexts).toHaveBeenCalledWith(10);
  });

  test('manual window still waits and re-checks when link texts cannot be read', async () => {
    const session = menuSession();
    for (const url of entryFormUrls(MENU_URL, MENU_URL, PROFILE)) session.unreachable.add(url);
    vi.spyOn(session, 'linkTexts').mockImplementation(async () => {
      session.top.source = '<h2>學習日誌</h2>';
      throw new Error('Execution context was destroyed');
    });

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: true, strategy: 'manual' });
  });

  test('unreached when every strategy fails', async () => {
    const session = menuSession();
    for (const url of entryFormUrls(MENU_URL, MENU_URL, PROFILE)) session.unreachable.add(url);

    const outcome = await navigator(session).reachEntryForm();

    expect(outcome).toEqual({ reached: false });
    expect(session.visited).toHaveLength(4);
  });

  // ── isOnEntryForm ──────────────────────────────────────────────────

  describe('isOnEntryForm', () => {
    test('true on a URL marker', async () => {
      const session = menuSession();
      session.url = 'https://journal.test/punch/PunchList_A.jsp?page=1';
      expect(await navigator(session).isOnEntryForm()).toBe(true);
    });

    test('true on a markup marker', async () => {
      const session = menuSession();
      session.top.source = '<input type="text" id="date">';
      expect(await navigator(session).isOnEntryForm()).toBe(true);
    });

    test('false on the menu page', async () => {
      expect(await navigator(menuSession()).isOnEntryForm()).toBe(false);
    });
  });
});
