/**
 * HTML result pages of the Meetup linking flow. Styling comes from
 * /static/style.css, which nginx serves from disk.
 */

export interface LinkingPage {
  title: string;
  message: string;
}

export const LINKING_PAGES = {
  linked: (meetupName: string): LinkingPage => ({
    title: 'Meetup account linked',
    message: `Your Discord account is now linked to ${meetupName}'s Meetup account. You can close this page.`,
  }),
  invalidSession: {
    title: 'Link expired',
    message:
      'This link is invalid or has expired. Ask the bot for a new one by writing "link meetup" in a direct message.',
  },
  denied: {
    title: 'Linking cancelled',
    message:
      'Meetup did not grant access, so nothing was linked. Ask the bot for a new link to try again.',
  },
  discordAlreadyLinked: {
    title: 'Already linked',
    message:
      'Your Discord account is already linked to a Meetup account. Unlink it first by writing "unlink meetup" to the bot.',
  },
  meetupAlreadyLinked: {
    title: 'Already linked',
    message:
      'This Meetup account is already linked to another Discord account. Ask an organiser for help.',
  },
  upstreamError: {
    title: 'Meetup is not responding',
    message:
      'Something went wrong while talking to Meetup. Please try again in a few minutes with a new link.',
  },
  throttled: {
    title: 'Slow down',
    message:
      'Too many requests from your address. Wait a minute, then open the link again.',
  },
} as const;

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderLinkingPage(page: LinkingPage): string {
  const title = escapeHtml(page.title);
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${title} | SwissRPG</title>
    <link rel="stylesheet" href="/static/style.css" />
  </head>
  <body>
    <main class="card">
      <h1>${title}</h1>
      <p>${escapeHtml(page.message)}</p>
    </main>
  </body>
</html>
`;
}
