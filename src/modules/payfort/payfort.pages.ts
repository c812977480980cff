import type { InitiationParams } from "./payfort.processor.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<meta name="robots" content="noindex">
<title>${escapeHtml(title)}</title>
</head>
<body>
${body}
</body>
</html>
`;
}

/** Fields posted to the payment page; the page URL itself is the form action. */
const FORM_EXCLUDED = new Set(["payment_page_url", "csrf_token"]);

export function renderRedirectForm(params: InitiationParams, nonce: string): string {
  const inputs = Object.entries(params)
    .filter(([key, value]) => !FORM_EXCLUDED.has(key) && value !== undefined)
    .map(([key, value]) => `<input type="hidden" name="${escapeHtml(key)}" value="${escapeHtml(String(value))}">`)
    .join("\n");
  return layout(
    "Redirecting to payment",
    `<form id="payfort-payment-form" method="post" action="${escapeHtml(params.payment_page_url)}">
${inputs}
<noscript><button type="submit">Continue to payment</button></noscript>
</form>
<script nonce="${escapeHtml(nonce)}">document.getElementById("payfort-payment-form").submit();</script>`
  );
}

export interface WaitPageContext {
  transactionId: string;
  merchantReference: string;
  statusUrl: string;
  successUrl: string;
  errorUrl: string;
  maxAttempts: number;
  waitTimeMs: number;
}

const POLL_SCRIPT = `(function () {
  var el = document.getElementById("payment-wait");
  var d = el.dataset;
  var attempts = 0;
  var max = Number(d.maxAttempts);
  var wait = Number(d.waitTime);
  var url = d.statusUrl + "?transaction_id=" + encodeURIComponent(d.transactionId) +
    "&merchant_reference=" + encodeURIComponent(d.merchantReference);
  function poll() {
    attempts += 1;
    fetch(url, { credentials: "same-origin", headers: { Accept: "application/json" } })
      .then(function (res) {
        if (res.status === 200) { window.location.assign(d.successUrl); return; }
        if (res.status === 204 && attempts < max) { setTimeout(poll, wait); return; }
        window.location.assign(d.errorUrl);
      })
      .catch(function () {
        if (attempts < max) { setTimeout(poll, wait); } else { window.location.assign(d.errorUrl); }
      });
  }
  setTimeout(poll, wait);
})();`;

export function renderWaitPage(ctx: WaitPageContext, nonce: string): string {
  return layout(
    "Confirming your payment",
    `<main id="payment-wait"
  data-transaction-id="${escapeHtml(ctx.transactionId)}"
  data-merchant-reference="${escapeHtml(ctx.merchantReference)}"
  data-status-url="${escapeHtml(ctx.statusUrl)}"
  data-success-url="${escapeHtml(ctx.successUrl)}"
  data-error-url="${escapeHtml(ctx.errorUrl)}"
  data-max-attempts="${escapeHtml(ctx.maxAttempts)}"
  data-wait-time="${escapeHtml(ctx.waitTimeMs)}">
<h1>Confirming your payment</h1>
<p>Please keep this page open while we confirm your payment.</p>
</main>
<script nonce="${escapeHtml(nonce)}">${POLL_SCRIPT}</script>`
  );
}

export function renderErrorPage(): string {
  return layout(
    "Payment error",
    `<main>
<h1>Payment could not be completed</h1>
<p>Your payment was not processed. No charge was confirmed for this order. Please try again or contact support.</p>
</main>`
  );
}
