export const MESSAGE_LANGUAGES = ["az", "en", "ru"] as const;

export type MessageLanguage = (typeof MESSAGE_LANGUAGES)[number];

export type MessageKey =
  | "talk"
  | "attacking"
  | "prediction"
  | "no_results"
  | "no_information"
  | "error"
  | "generation_failed";

const FALLBACK_LANGUAGE: MessageLanguage = "en";

const MESSAGES: Record<MessageKey, Record<MessageLanguage, string>> = {
  talk: {
    az: [
      "Salam! Mən Azərbaycan xəbərləri üzrə köməkçiyəm.",
      "",
      "Nə edə bilərəm:",
      "• Xəbərləri axtarmaq və təhlil etmək",
      "• Hadisələr, şəxslər və təşkilatlar haqqında məlumat vermək",
      "• İl, ay və kateqoriya üzrə statistika göstərmək",
      "",
      "Nümunə: \"Bakıda bu gün nə olub?\" və ya \"İdman kateqoriyasında neçə xəbər var?\"",
      "",
      "Sualınızı yazın!"
    ].join("\n"),
    en: [
      "Hello! I'm an assistant for Azerbaijani news.",
      "",
      "What I can do:",
      "• Search and analyze news",
      "• Answer questions about events, people and organizations",
      "• Show statistics by year, month and category",
      "",
      "Try: \"What happened in Baku today?\" or \"How many sports news items are there?\"",
      "",
      "Ask me your question!"
    ].join("\n"),
    ru: [
      "Привет! Я помощник по новостям Азербайджана.",
      "",
      "Что я умею:",
      "• Искать и анализировать новости",
      "• Отвечать на вопросы о событиях, людях и организациях",
      "• Показывать статистику по годам, месяцам и категориям",
      "",
      "Например: \"Что произошло сегодня в Баку?\" или \"Сколько новостей в категории спорт?\"",
      "",
      "Задайте свой вопрос!"
    ].join("\n")
  },
  attacking: {
    az: [
      "Xəbərdarlıq",
      "",
      "Sorğunuzda potensial təhlükəli məzmun aşkar edildi.",
      "Sistem yalnız xəbər axtarışı və təhlili üçündür; şübhəli sorğular qeydə alınır.",
      "",
      "Zəhmət olmasa, xəbərlərlə bağlı sual verin."
    ].join("\n"),
    en: [
      "Warning",
      "",
      "Potentially dangerous content was detected in your query.",
      "This system is for news search and analysis only; suspicious requests are logged.",
      "",
      "Please ask a question about the news."
    ].join("\n"),
    ru: [
      "Предупреждение",
      "",
      "В вашем запросе обнаружено потенциально опасное содержимое.",
      "Система предназначена только для поиска и анализа новостей; подозрительные запросы регистрируются.",
      "",
      "Пожалуйста, задайте вопрос о новостях."
    ].join("\n")
  },
  prediction: {
    az: [
      "Sistem gələcək proqnozlarını dəstəkləmir.",
      "Keçmiş məlumatlara əsaslanan trend sualları verə bilərsiniz, məsələn:",
      "• \"Son 6 ayda hansı mövzular daha çox müzakirə olundu?\"",
      "• \"Ən çox təkrarlanan xəbər kateqoriyaları hansılardır?\""
    ].join("\n"),
    en: [
      "The system does not make predictions about the future.",
      "You can ask trend questions based on past data instead, for example:",
      "• \"Which topics were discussed most in the last 6 months?\"",
      "• \"Which news categories appear most often?\""
    ].join("\n"),
    ru: [
      "Система не делает прогнозов на будущее.",
      "Вместо этого можно задать вопросы о трендах по прошлым данным, например:",
      "• \"Какие темы обсуждались чаще всего за последние 6 месяцев?\"",
      "• \"Какие категории новостей встречаются чаще всего?\""
    ].join("\n")
  },
  no_results: {
    az: "Sorğunuz üzrə məlumat tapılmadı. Başqa sözlərlə və ya fərqli tarix aralığı ilə yenidən cəhd edin.",
    en: "No data was found for your query. Try different wording or another date range.",
    ru: "По вашему запросу данные не найдены. Попробуйте другую формулировку или другой диапазон дат."
  },
  no_information: {
    az: "Bu sual üzrə heç bir məlumat tapılmadı.",
    en: "No information was found for this question.",
    ru: "По этому вопросу информация не найдена."
  },
  error: {
    az: "Sorğunu emal edərkən xəta baş verdi. Zəhmət olmasa, bir az sonra yenidən cəhd edin.",
    en: "An error occurred while processing your query. Please try again later.",
    ru: "При обработке запроса произошла ошибка. Пожалуйста, повторите попытку позже."
  },
  generation_failed: {
    az: "Cavab hazırlamaq mümkün olmadı. Zəhmət olmasa, sualı yenidən verin.",
    en: "The answer could not be generated. Please ask again.",
    ru: "Не удалось сформировать ответ. Пожалуйста, задайте вопрос ещё раз."
  }
};

export const isMessageLanguage = (value: string): value is MessageLanguage =>
  MESSAGE_LANGUAGES.some((language) => language === value);

export const localizedMessage = (key: MessageKey, language: string): string => {
  const normalized = language.trim().toLowerCase();
  const templates = MESSAGES[key];
  return isMessageLanguage(normalized) ? templates[normalized] : templates[FALLBACK_LANGUAGE];
};
