import https from 'https';
import http from 'http';

type AlertContext = Record<string, unknown> | undefined;

const postJson = async (webhookUrl: string, payload: Record<string, unknown>): Promise<void> => {
  await new Promise<void>((resolve, reject) => {
    try {
      const url = new URL(webhookUrl);
      const data = JSON.stringify(payload);
      const transport = url.protocol === 'http:' ? http : https;

      const request = transport.request(
        {
          method: 'POST',
          protocol: url.protocol,
          hostname: url.hostname,
          port: url.port || (url.protocol === 'https:' ? 443 : 80),
          path: `${url.pathname}${url.search}`,
          headers: {
            'Content-Type': 'application/json',
            'Content-Length': Buffer.byteLength(data),
          },
          timeout: 5000,
        },
        (response) => {
          response.on('data', () => null);
          response.on('end', () => resolve());
        }
      );

      request.on('timeout', () => request.destroy(new Error('Ops alert request timed out')));
      request.on('error', (err) => reject(err));
      request.write(data);
      request.end();
    } catch (error) {
      reject(error);
    }
  });
};

export const notifyOps = async (
  message: string,
  context?: AlertContext,
  webhookUrl?: string
): Promise<void> => {
  if (!webhookUrl) {
    console.warn('[OPS ALERT]', message, context || {});
    return;
  }

  try {
    await postJson(webhookUrl, {
      text: message,
      attachments: context
        ? [
            {
              color: '#f97316',
              fields: Object.entries(context).map(([title, value]) => ({
                title,
                value: typeof value === 'string' ? value : JSON.stringify(value, null, 2),
                short: false,
              })),
            },
          ]
        : undefined,
    });
  } catch (error) {
    console.error('Failed to deliver ops alert', error);
  }
};
