// native-messaging ships no type declarations
declare module 'native-messaging' {
  type MessageHandler = (message: unknown) => void;
  type SendMessage = (message: object) => void;

  function nativeMessaging(handler: MessageHandler): SendMessage;
  export = nativeMessaging;
}
