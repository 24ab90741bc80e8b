export interface ConfigDefault {
  key: string;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Credentials
  {
    key: 'auth.credentialsFile',
    value: '"./secrets/credentials.json"',
    category: 'auth',
    description: 'JSON document holding broker credentials',
  },

  // Broker endpoints
  {
    key: 'broker.authorizeUrl',
    value: '"https://api.upstox.com/v2/login/authorization/dialog"',
    category: 'broker',
    description: 'Interactive authorization dialog',
  },
  {
    key: 'broker.tokenUrl',
    value: '"https://api.upstox.com/v2/login/authorization/token"',
    category: 'broker',
    description: 'Authorization-code exchange endpoint',
  },
  {
    key: 'broker.apiBaseUrl',
    value: '"https://api.upstox.com/v2"',
    category: 'broker',
    description: 'Base URL for profile and logout calls',
  },
  {
    key: 'broker.refreshSupported',
    value: 'false',
    category: 'broker',
    description: 'Broker issues refresh tokens',
  },
  {
    key: 'broker.requestTimeoutMs',
    value: '15000',
    category: 'broker',
    description: 'HTTP timeout for broker calls',
  },

  // Login flow
  {
    key: 'login.mode',
    value: '"automated"',
    category: 'login',
    description: 'automated | manual',
  },
  { key: 'login.maxAttempts', value: '3', category: 'login', description: 'Full login attempts' },
  {
    key: 'login.backoffBaseMs',
    value: '5000',
    category: 'login',
    description: 'First backoff between attempts (doubles)',
  },
  {
    key: 'login.backoffMaxMs',
    value: '60000',
    category: 'login',
    description: 'Backoff ceiling',
  },
  {
    key: 'login.stageTimeoutMs',
    value: '30000',
    category: 'login',
    description: 'Timeout per login stage',
  },
  {
    key: 'login.actionDelayMinMs',
    value: '500',
    category: 'login',
    description: 'Min pause between page actions',
  },
  {
    key: 'login.actionDelayMaxMs',
    value: '1500',
    category: 'login',
    description: 'Max pause between page actions',
  },
  { key: 'login.headless', value: 'true', category: 'login', description: 'Headless browser' },
  {
    key: 'login.lockoutPattern',
    value: '"captcha|account (is )?(locked|blocked|suspended)|too many (attempts|requests)"',
    category: 'login',
    description: 'Page text that aborts all retries',
  },
  {
    key: 'login.invalidTotpPattern',
    value: '"invalid (otp|totp|code)|incorrect (otp|code)"',
    category: 'login',
    description: 'Page text for a rejected TOTP',
  },
  {
    key: 'login.invalidPinPattern',
    value: '"invalid (pin|mpin)|incorrect (pin|mpin)|wrong (pin|mpin)"',
    category: 'login',
    description: 'Page text for a rejected MPIN',
  },
  {
    key: 'login.selectors.mobile',
    value: '"#mobileNum"',
    category: 'login',
    description: 'Mobile number input',
  },
  {
    key: 'login.selectors.requestOtp',
    value: '"#getOtp"',
    category: 'login',
    description: 'Button submitting the mobile number',
  },
  {
    key: 'login.selectors.totp',
    value: '"#otpNum"',
    category: 'login',
    description: 'TOTP input',
  },
  {
    key: 'login.selectors.totpSubmit',
    value: '"#continueBtn"',
    category: 'login',
    description: 'Button submitting the TOTP',
  },
  { key: 'login.selectors.pin', value: '"#pinCode"', category: 'login', description: 'MPIN input' },
  {
    key: 'login.selectors.pinSubmit',
    value: '"#pinContinueBtn"',
    category: 'login',
    description: 'Button submitting the MPIN',
  },

  // Driver
  {
    key: 'driver.browserBinary',
    value: '"google-chrome"',
    category: 'driver',
    description: 'Browser executable checked for its version',
  },
  {
    key: 'driver.cacheDir',
    value: '"./data/drivers"',
    category: 'driver',
    description: 'Driver cache root',
  },
  {
    key: 'driver.profileDir',
    value: '"./data/browser-profile"',
    category: 'driver',
    description: 'Browser user-data-dir used for logins',
  },
  {
    key: 'driver.manifestUrl',
    value:
      '"https://googlechromelabs.github.io/chrome-for-testing/latest-versions-per-milestone-with-downloads.json"',
    category: 'driver',
    description: 'Driver build manifest',
  },
  {
    key: 'driver.maxAttempts',
    value: '3',
    category: 'driver',
    description: 'Download attempts before the login attempt fails',
  },
  {
    key: 'driver.backoffBaseMs',
    value: '2000',
    category: 'driver',
    description: 'First backoff between downloads (doubles)',
  },
  {
    key: 'driver.checksums',
    value: '{}',
    category: 'driver',
    description: 'Pinned SHA-256 per driver version',
  },

  // Session
  {
    key: 'session.safetyMarginSeconds',
    value: '300',
    category: 'session',
    description: 'Treat tokens as expiring this long before expiry',
  },
  {
    key: 'session.dailyExpiry',
    value: '"03:30"',
    category: 'session',
    description: 'Broker daily token cutoff (HH:MM)',
  },
  {
    key: 'session.utcOffsetMinutes',
    value: '330',
    category: 'session',
    description: 'UTC offset of the broker cutoff',
  },
  {
    key: 'session.verifyCachedToken',
    value: 'true',
    category: 'session',
    description: 'Verify cached tokens before adopting them',
  },
  {
    key: 'session.preMarketLoginEnabled',
    value: 'true',
    category: 'session',
    description: 'Log in ahead of market open',
  },
  {
    key: 'session.preMarketLoginTime',
    value: '"08:45"',
    category: 'session',
    description: 'Pre-market login time (HH:MM, weekdays)',
  },
  {
    key: 'session.timezone',
    value: '"Asia/Kolkata"',
    category: 'session',
    description: 'Timezone for scheduled jobs',
  },
  {
    key: 'session.expiryCheckMinutes',
    value: '5',
    category: 'session',
    description: 'Expiry check interval',
  },
];
