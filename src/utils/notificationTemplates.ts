// ============================================
// src/utils/notificationTemplates.ts
// WhatsApp message bodies, one per template kind
// ============================================

export interface TemplateDataMap {
  enrollment: {
    userName: string;
    courseTitle: string;
    dashboardLink: string;
  };
  event_rsvp: {
    userName: string;
    eventTitle: string;
    eventDate: string;
    eventTime: string;
    eventLink: string | null;
  };
  certificate: {
    userName: string;
    courseTitle: string;
    certificateUrl: string;
  };
}

export type TemplateKind = keyof TemplateDataMap;

export const NotificationTemplates: { [K in TemplateKind]: (data: TemplateDataMap[K]) => string } = {
  // ==============================
  // Course notifications
  // ==============================
  enrollment: ({ userName, courseTitle, dashboardLink }) =>
    [
      `🎉 Welcome to ${courseTitle}!`,
      '',
      `Hi ${userName},`,
      '',
      'Congratulations on enrolling! 🎓',
      '',
      `📚 Access your course here: ${dashboardLink}`,
      '',
      'Need help? Just reply to this message!',
      '',
      'Happy Learning! 🚀',
    ].join('\n'),

  certificate: ({ userName, courseTitle, certificateUrl }) =>
    [
      '🏆 Certificate Earned!',
      '',
      `Congratulations ${userName}!`,
      '',
      `You've successfully completed: ${courseTitle}`,
      '',
      `Download your certificate: ${certificateUrl}`,
      '',
      'Share your achievement! 🎉',
    ].join('\n'),

  // ==============================
  // Event notifications
  // ==============================
  event_rsvp: ({ userName, eventTitle, eventDate, eventTime, eventLink }) =>
    [
      '✅ Event Registration Confirmed!',
      '',
      `Hi ${userName},`,
      '',
      `You're registered for: ${eventTitle}`,
      '',
      `📅 Date: ${eventDate}`,
      `⏰ Time: ${eventTime}${eventLink ? `\n\n🔗 Join here: ${eventLink}` : ''}`,
      '',
      'Add it to your calendar from the event page!',
      '',
      'See you there! 👋',
    ].join('\n'),
};

export const renderTemplate = <K extends TemplateKind>(kind: K, data: TemplateDataMap[K]): string =>
  NotificationTemplates[kind](data);
