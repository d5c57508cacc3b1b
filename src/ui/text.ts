// src/ui/text.ts
// Все пользовательские тексты в одном месте. Разметка — HTML.
import { esc } from "../lib/html";
import { formatMinutes, formatViews, type TierLimits } from "../limits";

// 0 и меньше — без ограничения просмотров
function linkViews(maxViews: number): string {
  if (maxViews === 1) return "one-time link";
  return maxViews > 0 ? `link, it opens ${maxViews} times` : "link, it opens any number of times";
}

export const TXT = {
  common: {
    error: "⚠️ Something went wrong. Please try again later.",
    banned: (reason: string | null) => `🚫 You are banned. Reason: ${esc(reason || "No reason provided")}`,
    staleButton: "This button is no longer active.",
    flowTimeout: "⏰ Timeout. Share cancelled.",
    cancelled: "❌ Cancelled.",
    nothingToCancel: "Nothing to cancel.",
  },

  menu: {
    main: (firstName: string, premium: boolean) => [
      `🔐 <b>Secret Share Bot</b>`,
      ``,
      `Hi, ${esc(firstName)}! Share messages and files that vanish after they are viewed.`,
      `Plan: <b>${premium ? "💎 Premium" : "Free"}</b>`,
    ].join("\n"),
    help: [
      `❓ <b>How it works</b>`,
      ``,
      `1. Tap <b>Share Message</b> or <b>Share File</b> and send the content.`,
      `2. Choose a recipient: a specific user or a one-off link.`,
      `3. Pick protection, a self-destruct timer and a view limit.`,
      `4. Confirm. The recipient gets a <b>View Secret</b> button or you get a link.`,
      ``,
      `Inline mode: type <code>@bot your secret</code> in any chat.`,
      ``,
      `Reactions: 👀 on a secret reveals it, 👍/👎 confirms or cancels a share, 🔥 on a receipt revokes it.`,
      ``,
      `/start — main menu, /cancel — cancel the current step.`,
    ].join("\n"),
    premium: (premium: boolean, expiry: Date | null, l: TierLimits, ownerMention: string) => [
      `💎 <b>Premium</b>`,
      ``,
      premium
        ? `You are premium${expiry ? ` until <b>${expiry.toISOString().slice(0, 10)}</b>` : ""}.`
        : `You are on the free plan.`,
      ``,
      `Your limits:`,
      `▫️ Max file size: ${l.maxFileSizeMb} MB`,
      `▫️ Longest timer: ${formatMinutes(Math.max(...l.destructOptions))}`,
      `▫️ Max views: ${l.maxAllowedViews === null ? "Unlimited" : formatViews(l.maxAllowedViews)}`,
      `▫️ Active secrets at once: ${l.maxActiveShares}`,
      ``,
      premium ? `Thanks for your support!` : `To upgrade contact ${ownerMention}.`,
    ].join("\n"),
  },

  share: {
    askMessage: "✍️ Send the text message you want to share secretly.",
    askFile: "📎 Send the file (document, photo, video, audio, voice, animation or sticker).",
    notText: "Please send a text message.",
    emptyText: "The message is empty. Send some text.",
    tooLong: (max: number) => `The message is too long. Maximum is ${max} characters.`,
    notFile: "Please send a file.",
    fileTooLarge: (maxMb: number) => `The file is too large. Your limit is ${maxMb} MB.`,
    tooManyActive: (max: number) => `You already have ${max} active secrets. Revoke some or wait for them to expire.`,
    askRecipientType: "👥 Who should receive this secret?",
    askRecipient: "👤 Send the recipient's @username or numeric ID, or forward a message from them.",
    recipientUnknown: "I don't know this user. Ask them to start the bot first, or send their numeric ID.",
    recipientSelf: "You can't send a secret to yourself.",
    recipientBot: "You can't send a secret to a bot.",
    recipientInvalid: "Send a @username, a numeric ID or a forwarded message.",
    protection: (fwd: boolean, prot: boolean, anon: boolean) => [
      `🛡 <b>Protection</b>`,
      ``,
      `Anonymous: <b>${anon ? "Yes" : "No"}</b>`,
      `Forward tag: <b>${fwd ? "Show" : "Hide"}</b>${anon ? " (ignored while anonymous)" : ""}`,
      `Protect content: <b>${prot ? "On" : "Off"}</b>`,
    ].join("\n"),
    askTtl: "⏱ Choose a self-destruct timer.",
    askViews: "👁 How many times can the secret be viewed?",
    confirm: (p: {
      type: string;
      recipient: string;
      preview: string;
      anonymous: boolean;
      forwardTag: boolean;
      protect: boolean;
      ttl: number;
      views: number;
    }) => [
      `📝 <b>Confirm your secret</b>`,
      ``,
      `▫️ <b>Type:</b> ${esc(p.type)}`,
      `▫️ <b>Content:</b> ${esc(p.preview)}`,
      `▫️ <b>Recipient:</b> ${esc(p.recipient)}`,
      `▫️ <b>Anonymous:</b> ${p.anonymous ? "Yes" : "No"}`,
      `▫️ <b>Forward tag:</b> ${p.forwardTag && !p.anonymous ? "Show" : "Hide"}`,
      `▫️ <b>Protect content:</b> ${p.protect ? "On" : "Off"}`,
      `▫️ <b>Self-destruct timer:</b> ${formatMinutes(p.ttl)}`,
      `▫️ <b>Max views:</b> ${formatViews(p.views)}`,
      ``,
      `React 👍 to confirm or 👎 to cancel.`,
    ].join("\n"),
    sessionGone: "This share session is no longer active. Start again from the menu.",
    recipientBlocked: (name: string) => `❌ Could not deliver: ${esc(name)} has blocked the bot or never started it. Secret not created.`,
    sentToUser: (name: string) => `✅ Secret sent to <b>${esc(name)}</b>.\n\nReact 🔥 to this message to revoke it.`,
    sentLink: (link: string, maxViews: number) =>
      `✅ Secret created. Share this ${linkViews(maxViews)}:\n\n<code>${esc(link)}</code>\n\nReact 🔥 to this message to revoke it.`,
    controlAnonymous: "🔐 You have received a secret.",
    controlNamed: (senderMention: string) => `🔐 You have received a secret from ${senderMention}.`,
    controlFooter: "Tap the button or react 👀 to view it.",
  },

  view: {
    notFound: "❌ Secret not found or the link is invalid.",
    notForYou: "🚫 This secret is not intended for you.",
    revoked: "❌ This secret was revoked by the sender.",
    expired: "⏳ This secret has expired.",
    gone: "🔥 This secret was already viewed or has self-destructed.",
    maxViews: "👁️ This secret has reached its view limit.",
    deliveryFailed: "⚠️ Could not deliver the secret content. The original message may have been deleted.",
    notifySender: (recipient: string, viewer: string) =>
      `👁️ Your secret to <b>${esc(recipient)}</b> was viewed by <b>${esc(viewer)}</b>.`,
  },

  secrets: {
    empty: "📭 You have no active or viewed secrets.",
    title: (page: number, pages: number, total: number) => `🗂 <b>My Secrets</b> (${total}) — page ${page}/${pages}`,
    revoked: "✅ Secret revoked.",
    cannotRevoke: "This secret can no longer be revoked.",
    notYours: "This secret does not belong to you.",
  },

  settings: {
    title: "⚙️ <b>Settings</b>\n\nDefaults for new secrets and notifications.",
  },

  admin: {
    title: "🛠 <b>Admin Panel</b>",
    askUser: "👤 Send the user's numeric ID or @username, or forward a message from them.",
    userNotFound: "User not found. They need to start the bot first.",
    askBroadcast: "📣 Send the message to broadcast (any type).",
    confirmBroadcast: (n: number) => `Broadcast this message to ${n} user(s)?`,
    broadcastDone: (sent: number, failed: number) => `📣 Broadcast finished. Sent: ${sent}, failed: ${failed}.`,
    broadcastCancelled: "Broadcast cancelled.",
    askBanReason: "✍️ Send the ban reason.",
    done: "✅ Done.",
    ownerImmutable: "The owner can't be changed.",
    notSelf: "You can't do that to yourself.",
    youAreBanned: (reason: string) => `🚫 You have been banned. Reason: ${esc(reason)}`,
    youAreUnbanned: "✅ You have been unbanned.",
    youArePremium: "💎 You have been granted premium!",
    stats: (u: { total: number; banned: number; sudo: number; premium: number }, s: { total: number; active: number; viewed: number; finalized: number }) => [
      `📊 <b>Statistics</b>`,
      ``,
      `<b>Users:</b> ${u.total}`,
      `▫️ Banned: ${u.banned}`,
      `▫️ Sudo: ${u.sudo}`,
      `▫️ Premium: ${u.premium}`,
      ``,
      `<b>Secrets:</b> ${s.total}`,
      `▫️ Active: ${s.active}`,
      `▫️ Viewed: ${s.viewed}`,
      `▫️ Finalized: ${s.finalized}`,
    ].join("\n"),
  },

  inline: {
    startFirstTitle: "Start the bot first",
    startFirstText: "To share secrets inline, open the bot and press Start first.",
    tooLongTitle: "Secret is too long",
    resultTitle: "🔐 Send as a one-time secret",
    resultText: (link: string) => `🔐 I shared a secret with you. Open it once: ${link}`,
    tempMessage: (text: string) => `🔐 Inline secret (kept until it is viewed):\n\n${esc(text)}`,
  },
} as const;
