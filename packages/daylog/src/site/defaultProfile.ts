import type { SiteProfile } from './types';

/**
 * The punch-card portal's learning-journal form, as deployed at the time
 * of writing. Fallback order inside each list is priority order.
 */
export const DEFAULT_PROFILE: SiteProfile = {
  name: 'punch-journal',

  login: {
    accountField: [
      { strategy: 'id', selector: 'txtLoginID' },
      { strategy: 'name', selector: 'txtLoginID' },
    ],
    secretField: [
      { strategy: 'id', selector: 'txtLoginPWD' },
      { strategy: 'name', selector: 'txtLoginPWD' },
    ],
    submit: [
      { strategy: 'id', selector: 'button', clickable: true },
      { strategy: 'css', selector: "input[value='登入']", clickable: true },
    ],
    markers: {
      positive: ['登出', 'logout', 'Menu'],
      negative: [],
    },
  },

  navigation: {
    featureLinks: [
      { strategy: 'xpath', selector: "//a[contains(text(), '學習日誌')]", clickable: true },
      { strategy: 'xpath', selector: "//a[contains(text(), '日誌')]", clickable: true },
      { strategy: 'xpath', selector: "//a[contains(@href, 'PunchList_A')]", clickable: true },
      { strategy: 'xpath', selector: "//li//a[contains(text(), '學習日誌')]", clickable: true },
      { strategy: 'xpath', selector: "//ul//a[contains(text(), '學習日誌')]", clickable: true },
      { strategy: 'xpath', selector: "//div//a[contains(text(), '學習日誌')]", clickable: true },
    ],
    urlMarkers: ['PunchList_A'],
    sourceMarkers: ['學習日誌', '工作內容', 'id="date"', 'id="work"'],
    rootSegment: '/punch/',
    pathSuffixes: ['/punch/PunchList_A.jsp', '/PunchList_A.jsp', '/punch/journal.jsp', '/journal.jsp'],
    linkSampleSize: 10,
  },

  entry: {
    dateField: [
      { strategy: 'id', selector: 'date' },
      { strategy: 'name', selector: 'date' },
      { strategy: 'css', selector: "input[placeholder*='民國yyymmdd']" },
    ],
    contentField: [
      { strategy: 'id', selector: 'work' },
      { strategy: 'name', selector: 'work' },
      // The site spells the attribute value "ture".
      { strategy: 'css', selector: "input[required='ture']:not([id='date'])" },
    ],
    categoryField: [
      { strategy: 'id', selector: 'schno' },
      { strategy: 'name', selector: 'schno' },
      { strategy: 'tag', selector: 'select' },
    ],
    submit: [
      { strategy: 'id', selector: 'btnSent', clickable: true },
      { strategy: 'name', selector: 'btnSent', clickable: true },
      { strategy: 'css', selector: "input[value*='新增']", clickable: true },
      { strategy: 'css', selector: "input[onclick*='add']", clickable: true },
    ],
    markers: {
      positive: ['成功', '完成', '新增完成', '儲存成功', 'success'],
      negative: ['錯誤', '失敗', '重複', '已存在', 'error'],
    },
  },
};
