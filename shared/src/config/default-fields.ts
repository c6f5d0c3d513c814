import type { FlaggedFieldDefinition } from '../types/field.js';

/**
 * Decoy inputs seeded into every form. The names only have to look like
 * something a scraper would want to fill.
 */
export const DEFAULT_HONEYPOT_FIELDS: readonly FlaggedFieldDefinition[] = [
  [false, 'csrf_token', 'text', 'securized timestamp token'],
  [false, 'internal_reference', 'number', 'User subscriber number'],
  [false, 'order_date', 'date', 'Date of order'],
  [false, 'user_date_of_birth', 'date', 'User date of birth'],
  [false, 'user_subscriber_number', 'text', 'User subscriber number'],
  [false, 'user_gender', 'text', 'User gender [male/female]'],
  [false, 'user_first_name', 'text', 'User first name'],
  [false, 'user_last_name', 'text', 'User last name'],
  [false, 'user_middle_name', 'text', 'User middle name'],
  [false, 'user_company', 'text', 'User company name'],
  [false, 'user_email', 'email', 'User email'],
  [false, 'user_password', 'password', 'User password'],
  [false, 'user_password_confirm', 'password', 'User confirm password'],
  [false, 'user_address', 'text', 'User main address'],
  [false, 'user_city', 'text', 'User address city'],
  [false, 'user_zip', 'text', 'User address zip code'],
  [false, 'user_country', 'text', 'User address country'],
  [false, 'user_phone_number', 'tel', 'User phone number'],
  [false, 'user_fax_number', 'tel', 'User fax number'],
  [false, 'user_mobile_number', 'tel', 'User mobile phone number'],
  [false, 'user_linkedin_url', 'url', 'User LinkedIn Account'],
  [false, 'user_facebook_url', 'url', 'User Facebook Account'],
  [false, 'user_twitter_url', 'url', 'User Twitter/X Account'],
  [false, 'user_bluesky_url', 'url', 'User Bluesky Account'],
  [false, 'user_youtube_url', 'url', 'User YouTube Account'],
  [false, 'search_query', 'text', 'Search query'],
  [false, 'input_title', 'text', 'Selected title'],
  [false, 'input_recipient', 'text', 'Selected recipient'],
  [false, 'input_message', 'text', 'Your message here'],
  [false, 'promotional_code', 'text', 'Set your promotional code here if needed'],
  [false, 'sms_code_confirm', 'text', 'A code from SMS mobile phone number check'],
  [false, 'rgpd_accept', 'checkbox', 'Accept the use of personal data'],
  [false, 'third_party_cookies_accept', 'checkbox', 'Accept the use of third-party cookies'],
  [false, 'adult_confirm', 'checkbox', 'Are you an adult (confirm 18+)'],
];
