import type { NewService, SettingEntry } from '../interfaces/catalog.interface';

export const DEFAULT_SERVICES: NewService[] = [
  {
    name: 'Business Cards',
    description: 'Professional business cards with various finishes',
    category: 'cards',
    priceRange: '$50-200 per 1000',
  },
  {
    name: 'Flyers/Brochures',
    description: 'Marketing materials for promotions and information',
    category: 'marketing',
    priceRange: '$100-500',
  },
  {
    name: 'Banners/Posters',
    description: 'Large format printing for events and advertising',
    category: 'large_format',
    priceRange: '$200-1000',
  },
  {
    name: 'Booklets/Catalogs',
    description: 'Multi-page printed materials with binding options',
    category: 'publications',
    priceRange: '$300-1500',
  },
  {
    name: 'Stickers/Labels',
    description: 'Custom stickers and labels for branding',
    category: 'labels',
    priceRange: '$100-400',
  },
  {
    name: 'Custom Printing',
    description: 'Specialized printing services tailored to your needs',
    category: 'general',
    priceRange: 'Quote on request',
  },
];

export const SETTING_KEYS = {
  welcomeMessage: 'welcome_message',
  businessHours: 'business_hours',
  adminNotifications: 'admin_notifications',
} as const;

export const DEFAULT_SETTINGS: SettingEntry[] = [
  {
    key: SETTING_KEYS.welcomeMessage,
    value: 'Your trusted printing partner. Place an order, schedule a talk, or message us directly.',
    description: 'Bot welcome message',
  },
  {
    key: SETTING_KEYS.businessHours,
    value: 'Monday-Friday: 9AM-6PM, Saturday: 10AM-4PM',
    description: 'Business operating hours',
  },
  { key: 'min_order_value', value: '10.0', description: 'Minimum order value in USD' },
  { key: 'max_order_value', value: '5000.0', description: 'Maximum order value in USD' },
  { key: 'auto_quote_enabled', value: 'true', description: 'Enable automatic quote generation' },
  {
    key: SETTING_KEYS.adminNotifications,
    value: 'true',
    description: 'Enable admin notifications for new orders, consultations and messages',
  },
];
