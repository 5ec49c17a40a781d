import type { BroadcastContent, DeliveryReport, DeliveryTally } from "../domain/broadcast/index.js";
import type { AdminStats } from "../repository/types.js";
import type { BroadcastStatusView } from "../services/broadcast-runner.js";

// =============================================================================
// User-facing texts (Ukrainian, HTML parse mode)
// =============================================================================

export interface Branding {
  /** @username of the main channel */
  mainChannel: string;
  mainChannelLink: string;
  /** Admin username without the leading @ */
  adminContact: string;
}

export const MENU_LABELS = {
  chooseCity: "🏙 Обрати місто",
  listApartment: "📝 Здати квартиру",
  subscribe: "📢 Підписатися на канал",
  checkSubscription: "✅ Перевірити підписку",
  help: "ℹ️ Допомога",
} as const;

export type MenuButton = keyof typeof MENU_LABELS;

export const BUTTON_LABELS = {
  backToMenu: "🔙 Назад до меню",
  subscribe: "📢 Підписатися",
  checkSubscription: "✅ Перевірити підписку",
  chooseOtherCity: "🏙 Обрати інше місто",
  listApartment: "📝 Здати квартиру",
  writeAdmin: "✍️ Написати адміністратору",
  openMainChannel: "📢 Відкрити канал",
  adminStats: "📊 Статистика",
  adminBroadcast: "📩 Розсилка",
  adminUsers: "👥 Користувачі",
  adminClearCache: "🔄 Очистити кеш",
} as const;

const ALERTS = {
  noAccess: "❌ Немає доступу",
  noCitySelected: "❌ Помилка: місто не обрано",
  cityNotFound: "❌ Помилка: місто не знайдено",
  subscriptionConfirmed: "✅ Підписка підтверджена!",
  subscriptionMissing: "❌ Підписку не знайдено. Спочатку підпишіться на канал!",
  cacheCleared: "✅ Всі кеші очищено!",
} as const;

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** HH:MM:SS DD.MM.YYYY in server local time */
export function formatDateTime(date: Date): string {
  return (
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ` +
    `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()}`
  );
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function contentLabel(content: BroadcastContent): string {
  return content.kind === "photo" ? "фото з текстом" : "текстове повідомлення";
}

export interface RuntimeCounters {
  users: number;
  availableCities: number;
  spamBlocked: number;
  subscriptionCache: number;
  replyCache: number;
  sessions: number;
}

export function createTexts(brand: Branding) {
  const channel = escapeHtml(brand.mainChannel);
  const contact = `@${escapeHtml(brand.adminContact)}`;

  return {
    alerts: ALERTS,

    welcome: (firstName: string | null) =>
      `👋 <b>Вітаємо, ${escapeHtml(firstName ?? "друже")}!</b>\n\n` +
      "🏠 Бот для пошуку каналів з орендою житла без ріелтора\n\n" +
      "📍 Оберіть потрібну дію з меню:",

    greeting: (firstName: string | null) =>
      `👋 <b>Привіт, ${escapeHtml(firstName ?? "друже")}!</b>\n\n` +
      "🏠 Цей бот допомагає знаходити канали з орендою житла.\n\n" +
      "🚀 Використовуйте меню нижче для навігації:",

    help:
      "ℹ️ <b>Довідка по боту</b>\n\n" +
      "🏠 <b>Що робить бот:</b>\n" +
      "• Допомагає знайти канали з орендою житла\n" +
      "• Підбирає канал для вашого міста\n" +
      "• Допомагає розмістити оголошення\n\n" +
      "📋 <b>Як користуватися:</b>\n" +
      `1️⃣ Підпишіться на ${channel}\n` +
      "2️⃣ Оберіть ваше місто\n" +
      "3️⃣ Отримайте посилання на канал\n\n" +
      `🆘 <b>Підтримка:</b> ${contact}\n` +
      `📢 <b>Головний канал:</b> ${channel}`,

    chooseCity: "🏙 <b>Оберіть ваше місто:</b>\n\nНатисніть на кнопку з назвою міста або напишіть її:",

    listApartment:
      "🏠 <b>Здача квартири</b>\n\n" +
      "📝 Для розміщення оголошення про здачу квартири зверніться до нашого адміністратора:\n\n" +
      `👤 ${contact}\n\n` +
      "Адміністратор допоможе вам:\n" +
      "• Оформити оголошення\n" +
      "• Розмістити в потрібному каналі\n" +
      "• Відповісти на всі питання",

    subscribe:
      "📢 <b>Головний канал</b>\n\n" +
      "Підпишіться на наш головний канал, щоб отримувати:\n" +
      "• Нові оголошення про оренду\n" +
      "• Корисні поради\n" +
      "• Новини ринку нерухомості\n\n" +
      `📱 ${channel}`,

    subscriptionStatus: (subscribed: boolean) =>
      subscribed
        ? "✅ <b>Відмінно!</b>\n\n" +
          `Ви підписані на ${channel}\n\n` +
          "Тепер можете обирати місто та отримувати доступ до каналів з орендою житла!"
        : "❌ <b>Підписку не знайдено</b>\n\n" +
          "Для використання бота необхідно підписатися на наш головний канал:\n\n" +
          `📢 ${channel}`,

    cityNotFound: (input: string) =>
      `❌ <b>Місто '${escapeHtml(input)}' не знайдено</b>\n\n` +
      "💡 <b>Поради:</b>\n" +
      "• Перевірте правильність написання\n" +
      "• Спробуйте повну назву міста\n" +
      "• Оберіть зі списку нижче:",

    cityUnavailable: (cityName: string) =>
      `⏳ <b>Місто: ${escapeHtml(cityName)}</b>\n\n` +
      "❗️ Канал для цього міста поки недоступний.\n\n" +
      "Оберіть інше місто:",

    cityUnavailableShort: "⏳ <b>Місто не знайдено або канал недоступний</b>\n\nОберіть інше місто:",

    subscriptionPrompt: (cityName: string) =>
      `🏠 <b>Ви обрали: ${escapeHtml(cityName)}</b>\n\n` +
      "✨ Для доступу до каналу спочатку підпишіться на наш головний канал:\n\n" +
      `📢 <b>${channel}</b>`,

    channelDelivered: (cityName: string) =>
      "✅ <b>Дякуємо за підписку!</b>\n\n" +
      `🏠 <b>Ваше місто: ${escapeHtml(cityName)}</b>\n\n` +
      "📢 Ось посилання на канал з орендою житла:",

    channelButton: (cityName: string) => `🔗 Канал ${cityName}`,

    mainMenu: "🏠 <b>Головне меню</b>\n\nОберіть потрібну дію з меню нижче:",

    cancelled: "❌ <b>Дію скасовано</b>\n\n🔄 Повертаємося до головного меню:",
    nothingToCancel: "✅ Немає активних дій для скасування",
    unknownCommand: "❌ Вибачте, команда не розпізнана",

    // -------------------------------------------------------------------------
    // Admin
    // -------------------------------------------------------------------------

    adminPanel: (users: number, availableCities: number, now: Date) =>
      "👑 <b>Адмін панель</b>\n\n" +
      `👥 Користувачів: <b>${users}</b>\n` +
      `🏙 Доступних міст: <b>${availableCities}</b>\n` +
      `⏰ ${formatDateTime(now)}`,

    runtimeStats: (counters: RuntimeCounters) =>
      "📊 <b>Детальна статистика:</b>\n\n" +
      `👥 Всього користувачів: <b>${counters.users}</b>\n` +
      `🏙 Доступних міст: <b>${counters.availableCities}</b>\n` +
      `🚫 Заблокованих за спам: <b>${counters.spamBlocked}</b>\n` +
      `💾 Кеш підписок: <b>${counters.subscriptionCache}</b>\n` +
      `🗨 Кеш повідомлень: <b>${counters.replyCache}</b>\n` +
      `💬 Активних сесій: <b>${counters.sessions}</b>`,

    extendedStats: (stats: AdminStats, availableCities: number, subscriptionCache: number, now: Date) => {
      let text =
        "📊 <b>Розширена статистика</b>\n\n" +
        `👥 Всього користувачів: <b>${stats.totalUsers}</b>\n` +
        `✅ Активних: <b>${stats.activeUsers}</b>\n` +
        `🚫 Заблокованих: <b>${stats.blockedUsers}</b>\n` +
        `📤 Відписалось: <b>${stats.totalUnsubscriptions}</b>\n\n` +
        "📈 <b>За 7 днів:</b>\n" +
        `🆕 Нових: <b>${stats.newUsers7d}</b>\n` +
        `👋 Пішло: <b>${stats.unsubscribed7d}</b>\n\n` +
        `🏙 Доступних міст: <b>${availableCities}</b>\n` +
        `💾 Кеш підписок: <b>${subscriptionCache}</b>\n` +
        `⏰ Оновлено: ${formatDateTime(now).slice(0, 8)}`;

      if (stats.topCities.length > 0) {
        text += "\n\n🔥 <b>Топ міст (30 днів):</b>\n";
        text += stats.topCities
          .map((city, i) => `${i + 1}. ${escapeHtml(city.cityNameUk)}: <b>${city.count}</b>`)
          .join("\n");
      }
      return text;
    },

    usersInfo: (stats: AdminStats) =>
      "👥 <b>Інформація про користувачів</b>\n\n" +
      `Всього користувачів: <b>${stats.totalUsers}</b>\n` +
      `Активних: <b>${stats.activeUsers}</b>\n` +
      `Заблокованих: <b>${stats.blockedUsers}</b>\n` +
      `Відписалось: <b>${stats.totalUnsubscriptions}</b>\n\n` +
      "📈 <b>За останній тиждень:</b>\n" +
      `Нових користувачів: <b>${stats.newUsers7d}</b>\n` +
      `Відписалось: <b>${stats.unsubscribed7d}</b>`,

    broadcastPrompt: (activeUsers: number) =>
      "📢 <b>Розсилка повідомлень</b>\n\n" +
      `👥 Активних користувачів: <b>${activeUsers}</b>\n\n` +
      "📝 Надішліть повідомлення для розсилки:\n\n" +
      "✅ <b>Підтримується:</b>\n" +
      "• Текстові повідомлення\n" +
      "• Фото з підписом\n" +
      "• Форматування HTML\n\n" +
      "❌ Для скасування: /cancel",

    broadcastEmpty: "❌ Повідомлення не містить тексту або фото.\n\nНадішліть інше або /cancel",
    broadcastBusy: "⏳ Розсилка вже виконується. Дочекайтеся її завершення.",
    broadcastNoUsers: "❌ Немає користувачів для розсилки",

    botStarted: (username: string, now: Date) =>
      "🚀 <b>Бот запущено!</b>\n\n" +
      `🤖 @${escapeHtml(username)}\n` +
      `⏰ ${formatDateTime(now)}\n` +
      `👤 Контакт: ${contact}\n` +
      "🛡 Антиспам: активний",
  };
}

export type Texts = ReturnType<typeof createTexts>;

/**
 * Admin status message for a broadcast run.
 */
export const broadcastStatusView: BroadcastStatusView = {
  started: (recipients: number, content: BroadcastContent) =>
    "📤 <b>Розпочинаю розсилку...</b>\n\n" +
    `👥 Користувачів: ${recipients}\n` +
    `📄 Тип: ${contentLabel(content)}`,

  progress: (tally: DeliveryTally) =>
    "📤 <b>Розсилка в процесі...</b>\n\n" +
    `✅ Відправлено: ${tally.sent}\n` +
    `❌ Помилок: ${tally.failed}\n` +
    `🚫 Заблокували: ${tally.blocked}\n` +
    `📊 Прогрес: ${tally.sent + tally.failed + tally.blocked}/${tally.total}`,

  finished: (report: DeliveryReport, content: BroadcastContent) =>
    "✅ <b>Розсилка завершена!</b>\n\n" +
    `📤 Відправлено: <b>${report.sent}</b>\n` +
    `❌ Помилок: <b>${report.failed}</b>\n` +
    `🚫 Заблокували бота: <b>${report.blocked}</b>\n` +
    `📄 Тип: <b>${content.kind === "photo" ? "фото" : "текстове повідомлення"}</b>\n\n` +
    `📊 Успішність: <b>${percent(report.successRatio)}</b>`,
};

export const BOT_COMMANDS = [
  { command: "start", description: "🚀 Почати роботу" },
  { command: "help", description: "ℹ️ Довідка" },
  { command: "cancel", description: "❌ Скасувати дію" },
];
