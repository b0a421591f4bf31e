import nock from 'nock';
import { ChatService } from '../../../src/presentation/services/ChatService';

describe('ChatService', () => {
    const botToken = 'test-bot-token';

    beforeAll(() => {
        nock.disableNetConnect();
    });

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    it('should send a plain-text reply threaded under the original message', async () => {
        const scope = nock('https://api.telegram.org')
            .post(`/bot${botToken}/sendMessage`, {
                chat_id: '42',
                text: '🇫🇷: Bonjour',
                reply_parameters: { message_id: 10, allow_sending_without_reply: true },
            })
            .reply(200, { ok: true });

        await new ChatService(botToken).sendMessage('42', '🇫🇷: Bonjour', '10');

        expect(scope.isDone()).toBe(true);
    });

    it('should omit reply parameters when not replying', async () => {
        const scope = nock('https://api.telegram.org')
            .post(`/bot${botToken}/sendMessage`, { chat_id: '42', text: 'Hello' })
            .reply(200, { ok: true });

        await new ChatService(botToken).sendMessage('42', 'Hello');

        expect(scope.isDone()).toBe(true);
    });

    it('should truncate text beyond the message limit', async () => {
        const scope = nock('https://api.telegram.org')
            .post(`/bot${botToken}/sendMessage`, (body) => body.text === 'a'.repeat(4096))
            .reply(200, { ok: true });

        await new ChatService(botToken).sendMessage('42', 'a'.repeat(5000));

        expect(scope.isDone()).toBe(true);
    });

    it('should not truncate through the middle of an emoji', async () => {
        const scope = nock('https://api.telegram.org')
            .post(`/bot${botToken}/sendMessage`, (body) => body.text === 'a'.repeat(4095))
            .reply(200, { ok: true });

        await new ChatService(botToken).sendMessage('42', `${'a'.repeat(4095)}😀 and more`);

        expect(scope.isDone()).toBe(true);
    });

    it('should log and swallow API failures', async () => {
        nock('https://api.telegram.org')
            .post(`/bot${botToken}/sendMessage`)
            .reply(403, { ok: false, description: 'Forbidden: bot was kicked from the group chat' });

        await expect(new ChatService(botToken).sendMessage('42', 'Hello')).resolves.toBeUndefined();
        expect(console.error).toHaveBeenCalledWith(
            '[Telegram] Failed to send message to chat 42: Request failed with status code 403'
        );
    });

    it('should skip sending without a bot token', async () => {
        await new ChatService('').sendMessage('42', 'Hello');

        expect(console.warn).toHaveBeenCalledWith('[Telegram] Bot token not configured, skipping message send');
    });
});
