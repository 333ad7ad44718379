/**
 * HTML email templates for account and payout notifications.
 * Inline styles and table layout for mail-client compatibility.
 */

export interface RenderedEmail {
    subject: string;
    html: string;
    text: string;
}

interface VerifyEmailData {
    username: string;
    verifyUrl: string;
    expiresInHours: number;
}

interface ReviewDecisionData {
    name: string;
    subject: 'brand' | 'influencer';
    decision: string;
    notes?: string | null;
}

interface PayoutSentData {
    payoutId: string;
    amount: string;
    currency: string;
    reference?: string | null;
    date: string;
}

interface TopUpData {
    reference: string;
    amount: string;
    currency: string;
    date: string;
}

const escapeHtml = (value: string): string =>
    value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');

// ─── Shared Layout ──────────────────────────────────────────────────

function emailLayout(title: string, content: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
</head>
<body style="margin:0;padding:0;background-color:#f4f5f7;font-family:Arial,'Helvetica Neue',Helvetica,sans-serif;">
  <table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" style="background-color:#f4f5f7;">
    <tr>
      <td align="center" style="padding:32px 16px;">
        <table role="presentation" cellspacing="0" cellpadding="0" border="0" width="560" style="max-width:560px;width:100%;background-color:#ffffff;border-radius:8px;overflow:hidden;">
          <tr>
            <td style="background-color:#1a1a2e;padding:24px 32px;color:#ffffff;font-size:18px;font-weight:600;">
              Creator Marketplace
            </td>
          </tr>
          <tr>
            <td style="padding:32px;">
              ${content}
            </td>
          </tr>
          <tr>
            <td style="padding:16px 32px 24px;border-top:1px solid #eaedf0;">
              <p style="margin:0;font-size:12px;line-height:18px;color:#8c8c9a;">
                This is an automated notification. Please do not reply to this email.
              </p>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

function detailRow(label: string, value: string): string {
    return `<tr>
    <td style="padding:8px 12px;font-size:13px;color:#6b6b76;white-space:nowrap;vertical-align:top;">${label}</td>
    <td style="padding:8px 12px;font-size:13px;color:#1a1a2e;font-weight:500;word-break:break-all;">${value}</td>
  </tr>`;
}

function heading(title: string, lead: string): string {
    return `<h1 style="margin:0 0 8px;font-size:20px;font-weight:600;color:#1a1a2e;">${title}</h1>
    <p style="margin:0 0 24px;font-size:14px;line-height:22px;color:#4a4a5a;">${lead}</p>`;
}

function amountBox(label: string, amount: string): string {
    return `<table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" style="margin-bottom:24px;">
      <tr>
        <td style="background-color:#e6f4ed;border-radius:6px;padding:20px;text-align:center;">
          <p style="margin:0 0 4px;font-size:12px;color:#0d7237;text-transform:uppercase;letter-spacing:1px;">${label}</p>
          <p style="margin:0;font-size:28px;font-weight:700;color:#0d7237;">${amount}</p>
        </td>
      </tr>
    </table>`;
}

// ─── Email Verification ─────────────────────────────────────────────

export function verifyEmailEmail(data: VerifyEmailData): RenderedEmail {
    const url = escapeHtml(data.verifyUrl);
    const content = `
    ${heading('Confirm your email', `Hi ${escapeHtml(data.username)}, confirm your address to finish setting up your account.`)}
    <p style="margin:0 0 24px;">
      <a href="${url}" style="display:inline-block;padding:12px 24px;background-color:#1a1a2e;color:#ffffff;text-decoration:none;border-radius:6px;font-size:14px;font-weight:600;">Verify email</a>
    </p>
    <p style="margin:0;font-size:13px;line-height:20px;color:#6b6b76;">
      The link expires in ${data.expiresInHours} hours and can be used once.
    </p>`;

    return {
        subject: 'Confirm your email address',
        html: emailLayout('Confirm your email', content),
        text: `Hi ${data.username},\n\nConfirm your email address by opening this link:\n${data.verifyUrl}\n\nThe link expires in ${data.expiresInHours} hours and can be used once.`,
    };
}

// ─── Review Decision ────────────────────────────────────────────────

const DECISION_LEAD: Record<string, string> = {
    verified: 'Your brand account has been verified. You can now launch campaigns.',
    approved: 'Your creator profile has been approved. You can now accept jobs.',
    rejected: 'Your application was not approved.',
    request_info: 'We need more information before we can finish reviewing your account.',
    paused: 'Your account has been paused.',
};

export function reviewDecisionEmail(data: ReviewDecisionData): RenderedEmail {
    const lead = DECISION_LEAD[data.decision] ?? `Your ${data.subject} account status is now ${data.decision}.`;
    const notes = data.notes
        ? `<table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" style="background-color:#fafbfc;border-radius:6px;border:1px solid #eaedf0;">
      ${detailRow('Notes', escapeHtml(data.notes))}
    </table>`
        : '';

    return {
        subject: `Account update: ${data.decision.replace('_', ' ')}`,
        html: emailLayout('Account update', `${heading(`Hi ${escapeHtml(data.name)}`, lead)}${notes}`),
        text: `Hi ${data.name},\n\n${lead}${data.notes ? `\n\nNotes: ${data.notes}` : ''}`,
    };
}

// ─── Payout Sent ────────────────────────────────────────────────────

export function payoutSentEmail(data: PayoutSentData): RenderedEmail {
    const content = `
    ${heading('Payout sent', 'Your earnings have been sent to your default payment method.')}
    ${amountBox('Payout Amount', `${data.currency} ${data.amount}`)}
    <table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" style="background-color:#fafbfc;border-radius:6px;border:1px solid #eaedf0;">
      ${detailRow('Payout ID', data.payoutId)}
      ${data.reference ? detailRow('Reference', escapeHtml(data.reference)) : ''}
      ${detailRow('Date', data.date)}
    </table>`;

    return {
        subject: `Payout sent: ${data.currency} ${data.amount}`,
        html: emailLayout('Payout sent', content),
        text: `Payout sent\n\n${data.currency} ${data.amount} has been sent to your default payment method.\n\nPayout ID: ${data.payoutId}${data.reference ? `\nReference: ${data.reference}` : ''}\nDate: ${data.date}`,
    };
}

// ─── Wallet Top-up ──────────────────────────────────────────────────

export function topUpCreditedEmail(data: TopUpData): RenderedEmail {
    const content = `
    ${heading('Wallet topped up', 'Your payment was confirmed and added to your wallet.')}
    ${amountBox('Amount Added', `${data.currency} ${data.amount}`)}
    <table role="presentation" cellspacing="0" cellpadding="0" border="0" width="100%" style="background-color:#fafbfc;border-radius:6px;border:1px solid #eaedf0;">
      ${detailRow('Reference', data.reference)}
      ${detailRow('Date', data.date)}
    </table>`;

    return {
        subject: `Wallet topped up: ${data.currency} ${data.amount}`,
        html: emailLayout('Wallet topped up', content),
        text: `Wallet topped up\n\n${data.currency} ${data.amount} has been added to your wallet.\n\nReference: ${data.reference}\nDate: ${data.date}`,
    };
}
