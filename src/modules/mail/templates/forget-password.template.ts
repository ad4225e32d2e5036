export interface ForgetPasswordMail {
  greeting: string;
  intro: string;
  code: string;
  expiry: string;
  ignore: string;
}

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

export const renderForgetPasswordHtml = (mail: ForgetPasswordMail): string => `
<div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
  <h2>${escapeHtml(mail.greeting)}</h2>
  <p>${escapeHtml(mail.intro)}</p>
  <div style="background: #f5f5f5; padding: 20px; border-radius: 8px; margin: 20px 0; text-align: center;">
    <span style="font-size: 32px; font-weight: bold; letter-spacing: 8px;
                 font-family: 'Courier New', monospace; color: #007bff;">${escapeHtml(mail.code)}</span>
  </div>
  <p style="color: #666; font-size: 14px;">${escapeHtml(mail.expiry)}<br>${escapeHtml(mail.ignore)}</p>
</div>
`;
