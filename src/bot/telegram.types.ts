import Joi from 'joi';

export type TelegramUser = {
  id: number;
  username?: string;
};

export type TelegramChat = {
  id: number;
};

export type TelegramMessage = {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
};

/** The subset of a Bot API `Update` the dispatcher reads; other fields pass through. */
export type TelegramUpdate = {
  update_id: number;
  message?: TelegramMessage;
};

export type ParseMode = 'Markdown';

export const telegramUpdateSchema = Joi.object<TelegramUpdate>({
  update_id: Joi.number().integer().required(),
  message: Joi.object({
    message_id: Joi.number().integer().required(),
    chat: Joi.object({ id: Joi.number().integer().required() }).unknown().required(),
    from: Joi.object({
      id: Joi.number().integer().required(),
      username: Joi.string(),
    }).unknown(),
    text: Joi.string().allow(''),
  }).unknown(),
})
  .unknown()
  .required();
